/**
 * Control Module - Types
 */
import type { PowerAction } from "../cec/index.js";

/** Where a power command came from */
export type CommandSource = "web" | "button";

export type PowerCommandOutcome = Readonly<{
  action: PowerAction;
  source: CommandSource;
  success: boolean;
  message: string;
}>;

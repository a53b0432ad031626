/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { ButtonId } from "../buttons/index.js";
import type { PowerAction } from "../cec/index.js";
import type { CommandSource } from "../control/schema.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * A power command finished, from the web UI or a button.
 */
export type PowerCommandEvent = Readonly<{
  type: "power_command";
  action: PowerAction;
  source: CommandSource;
  success: boolean;
  message: string;
}>;

/**
 * A debounced button press was accepted.
 */
export type ButtonPressEvent = Readonly<{
  type: "button_press";
  button: ButtonId;
  pressCount: number;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent = PowerCommandEvent | ButtonPressEvent;

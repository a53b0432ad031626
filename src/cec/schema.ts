/**
 * CEC Module - Schemas and Types
 *
 * Commands and parsed output of the libCEC `cec-client` tool.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Configuration
// =============================================================================

export const CecConfigSchema = z.object({
  clientPath: z.string().min(1).describe("cec-client binary"),
  targetAddress: z.string().describe("Logical address power commands go to"),
  timeoutMs: z.number().positive().describe("Kill cec-client after this long"),
  cooldownMs: z
    .number()
    .nonnegative()
    .describe("Minimum time between rate-limited commands"),
});

export type CecConfig = z.infer<typeof CecConfigSchema>;

// =============================================================================
// Commands
// =============================================================================

/**
 * A single line typed into cec-client, e.g. "on 0", "pow 0", "tx 10:36".
 */
export const CecCommandSchema = z
  .string({
    required_error: "Command is required",
    invalid_type_error: "Command must be a string",
  })
  .trim()
  .min(1, "Command is required")
  .max(64, "Command too long")
  .regex(/^[A-Za-z0-9 :._-]+$/, "Command contains unsupported characters");

export const CustomCommandRequestSchema = z.object({
  command: CecCommandSchema,
});

export type CustomCommandRequest = z.infer<typeof CustomCommandRequestSchema>;

export type PowerAction = "ON" | "OFF";

// =============================================================================
// Parsed Output
// =============================================================================

export type TvPowerStatus = "ON" | "STANDBY" | "TRANSITIONING" | "UNKNOWN";

/**
 * One device block from `scan` output.
 */
export type CecDevice = Readonly<{
  logicalAddress: number;
  name: string;
  physicalAddress: string | null;
  activeSource: boolean | null;
  vendor: string | null;
  osdName: string | null;
  cecVersion: string | null;
  powerStatus: TvPowerStatus;
}>;

export type PowerStatusResult = Readonly<{
  output: string;
  power: TvPowerStatus;
}>;

export type ScanResult = Readonly<{
  output: string;
  devices: ReadonlyArray<CecDevice>;
}>;

// =============================================================================
// Dispatcher State
// =============================================================================

export type CecState = Readonly<{
  /** Time of the last accepted rate-limited command (null = none yet) */
  lastCommandTime: number | null;
  lastCommand: string | null;
}>;

export const INITIAL_CEC_STATE: CecState = {
  lastCommandTime: null,
  lastCommand: null,
};

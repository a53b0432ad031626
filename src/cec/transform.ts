/**
 * CEC Module - Pure Transformations
 *
 * Building cec-client command lines and parsing what it prints.
 */
import { type Result, err, ok } from "neverthrow";

import { type CecError, invalidCommand } from "./errors.js";
import {
  type CecDevice,
  CecCommandSchema,
  type CecState,
  type TvPowerStatus,
} from "./schema.js";

/**
 * Single-command mode, log level 1 (errors only): cec-client reads commands
 * from stdin and exits at EOF.
 */
export const CEC_CLIENT_ARGS: ReadonlyArray<string> = ["-s", "-d", "1"];

export const SCAN_COMMAND = "scan";

export const powerOnCommand = (address: string): string => `on ${address}`;

export const standbyCommand = (address: string): string => `standby ${address}`;

export const powerStatusCommand = (address: string): string => `pow ${address}`;

/**
 * Validate a user-supplied command line.
 */
export function validateCommand(raw: unknown): Result<string, CecError> {
  const parsed = CecCommandSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      invalidCommand(parsed.error.issues.map((i) => i.message).join(", ")),
    );
  }
  return ok(parsed.data);
}

// =============================================================================
// Rate Limiting
// =============================================================================

/**
 * Milliseconds left before another rate-limited command is accepted.
 */
export function remainingCooldownMs(
  lastCommandTime: number | null,
  now: number,
  cooldownMs: number,
): number {
  if (lastCommandTime === null) return 0;
  return Math.max(0, cooldownMs - (now - lastCommandTime));
}

export function recordCommand(
  state: CecState,
  command: string,
  now: number,
): CecState {
  return { ...state, lastCommandTime: now, lastCommand: command };
}

// =============================================================================
// Output Parsing
// =============================================================================

/**
 * Map the value of a "power status:" line.
 */
export function parsePowerStatus(value: string): TvPowerStatus {
  const normalized = value.trim().toLowerCase();
  if (normalized === "on") return "ON";
  if (normalized === "standby") return "STANDBY";
  if (normalized.startsWith("in transition")) return "TRANSITIONING";
  return "UNKNOWN";
}

/**
 * Find the power status in `pow` output.
 */
export function extractPowerStatus(output: string): TvPowerStatus {
  const match = output.match(/^\s*power status:\s*(.+)$/im);
  return match?.[1] ? parsePowerStatus(match[1]) : "UNKNOWN";
}

type MutableDevice = { -readonly [K in keyof CecDevice]: CecDevice[K] };

/**
 * Split `scan` output into device blocks.
 *
 * @example
 * device #0: TV
 * address:       0.0.0.0
 * active source: no
 * vendor:        Samsung
 * osd string:    TV
 * CEC version:   1.4
 * power status:  standby
 */
export function parseScanOutput(output: string): CecDevice[] {
  const devices: MutableDevice[] = [];
  let current: MutableDevice | null = null;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();

    const header = line.match(/^device #(\d+):\s*(.*)$/i);
    if (header) {
      current = {
        logicalAddress: Number(header[1]),
        name: header[2] ?? "",
        physicalAddress: null,
        activeSource: null,
        vendor: null,
        osdName: null,
        cecVersion: null,
        powerStatus: "UNKNOWN",
      };
      devices.push(current);
      continue;
    }

    if (!current) continue;

    const field = line.match(/^([A-Za-z][A-Za-z ]*?):\s*(.*)$/);
    if (!field) continue;

    const key = (field[1] ?? "").toLowerCase();
    const value = (field[2] ?? "").trim();

    switch (key) {
      case "address":
        current.physicalAddress = value;
        break;
      case "active source":
        current.activeSource = value === "yes";
        break;
      case "vendor":
        current.vendor = value;
        break;
      case "osd string":
        current.osdName = value;
        break;
      case "cec version":
        current.cecVersion = value;
        break;
      case "power status":
        current.powerStatus = parsePowerStatus(value);
        break;
      default:
        break;
    }
  }

  return devices;
}

/**
 * Buttons Module - Error Types
 *
 * Only start-up can fail. Steady-state problems are logged by the loop.
 */
import { type GpioError, formatGpioError } from "../gpio/index.js";
import type { ButtonId } from "./schema.js";

export type ButtonMonitorError =
  | {
      readonly type: "START_FAILED";
      readonly button: ButtonId;
      readonly pin: number;
      readonly cause: GpioError;
    }
  | {
      readonly type: "ALREADY_RUNNING";
    };

export function startFailed(
  button: ButtonId,
  pin: number,
  cause: GpioError,
): ButtonMonitorError {
  return { type: "START_FAILED", button, pin, cause };
}

export function alreadyRunning(): ButtonMonitorError {
  return { type: "ALREADY_RUNNING" };
}

/**
 * Format a ButtonMonitorError for logging.
 */
export function formatButtonMonitorError(error: ButtonMonitorError): string {
  switch (error.type) {
    case "START_FAILED":
      return `Cannot start ${error.button} button on GPIO ${error.pin}: ${formatGpioError(error.cause)}`;
    case "ALREADY_RUNNING":
      return "Button monitor is already running";
  }
}

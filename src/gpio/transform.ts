/**
 * GPIO Module - Pure Transformations
 *
 * Level decoding and error classification for pigpio.
 */
import type { GpioErrorType } from "./errors.js";
import type { PinLevel } from "./schema.js";

/**
 * Decode a `digitalRead()` result.
 * Returns null for anything that is not 0 or 1.
 */
export function levelFromDigit(value: number): PinLevel | null {
  switch (value) {
    case 0:
      return "LOW";
    case 1:
      return "HIGH";
    default:
      return null;
  }
}

/**
 * Classify an error thrown while setting up a pigpio input.
 *
 * pigpio reports failures as "pigpio error <code> in <function>".
 * gpioInitialise fails when the process may not map the GPIO registers
 * (not root, or pigpiod already holds them); -3 is PI_BAD_GPIO.
 */
export function classifyPigpioError(
  message: string,
): Extract<GpioErrorType, "NOT_AVAILABLE" | "PERMISSION_DENIED" | "CONFIGURE_FAILED"> {
  if (/gpioInitiali[sz]e|permission|EACCES|EPERM/i.test(message)) {
    return "PERMISSION_DENIED";
  }
  if (/pigpio error -3\b/.test(message)) {
    return "NOT_AVAILABLE";
  }
  return "CONFIGURE_FAILED";
}

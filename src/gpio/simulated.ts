/**
 * GPIO Module - Simulated Pin Source
 *
 * In-memory pins for development machines without GPIO, and for tests.
 */
import { type Result, err, ok } from "neverthrow";

import { type GpioError, type GpioErrorType, gpioError } from "./errors.js";
import type { PinLevel, PinSource } from "./schema.js";

export type SimulatedPinSource = PinSource & {
  setLevel(pin: number, level: PinLevel): void;
  /** Make configureInput fail for a pin */
  failConfigure(pin: number, type?: GpioErrorType): void;
  /** Make the next readLevel calls fail for a pin until cleared */
  failReads(pin: number, failing: boolean): void;
  isConfigured(pin: number): boolean;
};

export function createSimulatedPinSource(
  initialLevels: Readonly<Record<number, PinLevel>> = {},
): SimulatedPinSource {
  const levels = new Map<number, PinLevel>(
    Object.entries(initialLevels).map(([pin, level]) => [Number(pin), level]),
  );
  const configured = new Set<number>();
  const configureFailures = new Map<number, GpioErrorType>();
  const readFailures = new Set<number>();

  function configureInput(pin: number): Result<true, GpioError> {
    const failure = configureFailures.get(pin);
    if (failure) {
      return err(gpioError(failure, pin, "Simulated configure failure"));
    }
    configured.add(pin);
    return ok(true);
  }

  function readLevel(pin: number): Result<PinLevel, GpioError> {
    if (!configured.has(pin)) {
      return err(gpioError("NOT_AVAILABLE", pin, "Pin not configured"));
    }
    if (readFailures.has(pin)) {
      return err(gpioError("READ_FAILED", pin, "Simulated read failure"));
    }
    return ok(levels.get(pin) ?? "LOW");
  }

  return {
    backend: "simulated",
    configureInput,
    readLevel,
    release: (pin) => {
      configured.delete(pin);
    },
    setLevel: (pin, level) => {
      levels.set(pin, level);
    },
    failConfigure: (pin, type = "PERMISSION_DENIED") => {
      configureFailures.set(pin, type);
    },
    failReads: (pin, failing) => {
      if (failing) {
        readFailures.add(pin);
      } else {
        readFailures.delete(pin);
      }
    },
    isConfigured: (pin) => configured.has(pin),
  };
}

/**
 * GPIO Module - pigpio Pin Source
 *
 * Reads the buttons through the pigpio C library. Both inputs get the
 * internal pull-down; buttons are active high.
 *
 * pigpio is an optional native dependency: it only builds on a Raspberry Pi
 * with libpigpio installed, so it is loaded with require() on first use and
 * checked at runtime instead of imported.
 */
import { createRequire } from "node:module";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type GpioError, formatGpioError, gpioError } from "./errors.js";
import type { PinLevel, PinSource } from "./schema.js";
import { classifyPigpioError, levelFromDigit } from "./transform.js";

const log = createLogger("gpio");

// =============================================================================
// Library Boundary
// =============================================================================

/**
 * The part of a pigpio `Gpio` instance used for a button input.
 */
export type PigpioInput = {
  digitalRead(): number;
  pullUpDown(pud: number): unknown;
};

export type PigpioInputOptions = Readonly<{
  mode: number;
  pullUpDown: number;
}>;

/**
 * The pigpio `Gpio` class with the constants it carries.
 */
export type PigpioGpioClass = {
  new (gpio: number, options: PigpioInputOptions): PigpioInput;
  readonly INPUT: number;
  readonly PUD_OFF: number;
  readonly PUD_DOWN: number;
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function hasNumber(value: object, key: string): boolean {
  return key in value && typeof Reflect.get(value, key) === "number";
}

function isGpioClass(value: unknown): value is PigpioGpioClass {
  return (
    typeof value === "function" &&
    hasNumber(value, "INPUT") &&
    hasNumber(value, "PUD_OFF") &&
    hasNumber(value, "PUD_DOWN")
  );
}

const requireModule = createRequire(import.meta.url);

/**
 * Load the `Gpio` class from the pigpio package.
 */
export function loadPigpio(
  load: (id: string) => unknown = requireModule,
): Result<PigpioGpioClass, Error> {
  let loaded: unknown;
  try {
    loaded = load("pigpio");
  } catch (error) {
    return err(toError(error));
  }

  const gpio =
    typeof loaded === "object" && loaded !== null && "Gpio" in loaded
      ? loaded.Gpio
      : undefined;
  if (!isGpioClass(gpio)) {
    return err(new Error("pigpio does not export a usable Gpio class"));
  }
  return ok(gpio);
}

// =============================================================================
// Pin Source
// =============================================================================

export type PigpioPinSourceOptions = Readonly<{
  loadGpio?: () => Result<PigpioGpioClass, Error>;
}>;

export function createPigpioPinSource(
  options: PigpioPinSourceOptions = {},
): PinSource {
  const loadGpio = options.loadGpio ?? (() => loadPigpio());
  const inputs = new Map<number, PigpioInput>();
  let gpioClass: PigpioGpioClass | null = null;

  function resolveGpioClass(pin: number): Result<PigpioGpioClass, GpioError> {
    if (gpioClass) return ok(gpioClass);

    const loaded = loadGpio();
    if (loaded.isErr()) {
      return err(
        gpioError(
          "NOT_AVAILABLE",
          pin,
          `pigpio could not be loaded: ${loaded.error.message}`,
          loaded.error,
        ),
      );
    }
    gpioClass = loaded.value;
    return ok(gpioClass);
  }

  function configureInput(pin: number): Result<true, GpioError> {
    const resolved = resolveGpioClass(pin);
    if (resolved.isErr()) {
      log.error({ pin, error: formatGpioError(resolved.error) }, "Failed to configure input");
      return err(resolved.error);
    }
    const Gpio = resolved.value;

    try {
      inputs.set(pin, new Gpio(pin, { mode: Gpio.INPUT, pullUpDown: Gpio.PUD_DOWN }));
    } catch (error) {
      const cause = toError(error);
      const result = gpioError(classifyPigpioError(cause.message), pin, cause.message, cause);
      log.error({ pin, error: formatGpioError(result) }, "Failed to configure input");
      return err(result);
    }

    log.info({ pin }, "GPIO configured as input with pull-down");
    return ok(true);
  }

  function readLevel(pin: number): Result<PinLevel, GpioError> {
    const input = inputs.get(pin);
    if (!input) {
      return err(gpioError("NOT_AVAILABLE", pin, "Pin is not configured"));
    }

    let raw: number;
    try {
      raw = input.digitalRead();
    } catch (error) {
      const cause = toError(error);
      return err(gpioError("READ_FAILED", pin, cause.message, cause));
    }

    const level = levelFromDigit(raw);
    if (level === null) {
      return err(gpioError("READ_FAILED", pin, `Unexpected value ${raw}`));
    }
    return ok(level);
  }

  function release(pin: number): void {
    const input = inputs.get(pin);
    if (!input || !gpioClass) return;

    inputs.delete(pin);
    try {
      input.pullUpDown(gpioClass.PUD_OFF);
      log.debug({ pin }, "GPIO pull-down released");
    } catch (error) {
      log.warn({ pin, error: toError(error).message }, "Failed to release GPIO");
    }
  }

  return { backend: "pigpio", configureInput, readLevel, release };
}

/**
 * GPIO Module - Public API
 *
 * Pin source abstraction and its backends.
 */
import { createPigpioPinSource } from "./pigpio.js";
import type { GpioConfig, PinSource } from "./schema.js";
import { createSimulatedPinSource } from "./simulated.js";

// Types
export type { GpioConfig, PinLevel, PinSource } from "./schema.js";
export type { GpioError } from "./errors.js";
export type { PigpioGpioClass, PigpioInput } from "./pigpio.js";
export type { SimulatedPinSource } from "./simulated.js";

// Error utilities
export { formatGpioError } from "./errors.js";

// Backends
export { createPigpioPinSource, loadPigpio } from "./pigpio.js";
export { createSimulatedPinSource } from "./simulated.js";

/**
 * Create the pin source selected by configuration.
 */
export function createPinSource(config: GpioConfig): PinSource {
  switch (config.backend) {
    case "pigpio":
      return createPigpioPinSource();
    case "simulated":
      return createSimulatedPinSource();
  }
}

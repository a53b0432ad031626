/**
 * GPIO Module - Schemas and Types
 *
 * The pin source abstraction the button monitor reads from.
 */
import type { Result } from "neverthrow";
import { z } from "zod";
import type { GpioError } from "./errors.js";

// =============================================================================
// Pin Levels
// =============================================================================

export const PinLevelSchema = z.enum(["LOW", "HIGH"]);

export type PinLevel = z.infer<typeof PinLevelSchema>;

// =============================================================================
// Pin Source
// =============================================================================

/**
 * Access to digital input lines, addressed by BCM pin number.
 * One instance is owned by one consumer; nothing here is process-global.
 */
export interface PinSource {
  /** Human-readable backend name for logs */
  readonly backend: string;
  configureInput(pin: number): Result<true, GpioError>;
  readLevel(pin: number): Result<PinLevel, GpioError>;
  /** Give the line back to the system. Never fails; problems are logged. */
  release(pin: number): void;
}

// =============================================================================
// Configuration
// =============================================================================

export const GpioConfigSchema = z.object({
  backend: z.enum(["pigpio", "simulated"]),
});

export type GpioConfig = z.infer<typeof GpioConfigSchema>;

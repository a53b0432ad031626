/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * CEC Remote configuration covering:
 * - Server settings
 * - cec-client invocation
 * - GPIO push buttons
 * - SSD1306 OLED display
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * BCM pin number. Number("0x11") works too, so hex is accepted.
 */
const bcmPin = (defaultValue: number) =>
  z.coerce.number().int().min(0).max(53).default(defaultValue);

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(5000).describe("HTTP server port"),
  HOST: z.string().default("0.0.0.0").describe("HTTP bind address"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("CEC Remote").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // cec-client
  // ==========================================================================
  CEC_CLIENT_PATH: z
    .string()
    .min(1)
    .default("cec-client")
    .describe("Path or name of the libCEC cec-client binary"),
  CEC_TARGET_ADDRESS: z
    .string()
    .regex(/^([0-9]|1[0-5])$/, "CEC_TARGET_ADDRESS must be a logical address 0-15")
    .default("0")
    .describe("Logical CEC address power commands are sent to (0 = TV)"),
  CEC_COMMAND_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(8000)
    .describe("Kill cec-client if a command has not finished after this long"),
  CEC_COMMAND_COOLDOWN_MS: z.coerce
    .number()
    .nonnegative()
    .default(2000)
    .describe("Minimum time between power/custom commands (anti-loop)"),

  // ==========================================================================
  // Push Buttons (GPIO)
  // ==========================================================================
  BUTTONS_ENABLED: envBoolean(true).describe("Enable the physical buttons"),
  BUTTON_POWER_ON_PIN: bcmPin(17).describe("BCM pin of the power ON button"),
  BUTTON_POWER_OFF_PIN: bcmPin(27).describe("BCM pin of the power OFF button"),
  GPIO_BACKEND: z
    .enum(["pigpio", "simulated"])
    .default("pigpio")
    .describe("Pin source implementation"),

  // ==========================================================================
  // OLED Display
  // ==========================================================================
  DISPLAY_ENABLED: envBoolean(true).describe("Enable the status display"),
  DISPLAY_DRIVER: z
    .enum(["ssd1306", "log"])
    .default("ssd1306")
    .describe("Display driver"),
  DISPLAY_I2C_BUS: z.coerce.number().int().nonnegative().default(1),
  DISPLAY_I2C_ADDRESS: z.coerce
    .number()
    .int()
    .min(0x03)
    .max(0x77)
    .default(0x3c)
    .describe("7-bit I2C address of the panel"),
  DISPLAY_WIDTH: z.coerce.number().int().positive().default(128),
  DISPLAY_HEIGHT: z.coerce
    .number()
    .int()
    .refine((h) => h === 32 || h === 64, "DISPLAY_HEIGHT must be 32 or 64")
    .default(64),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

export function getCecConfig(): Readonly<{
  clientPath: string;
  targetAddress: string;
  timeoutMs: number;
  cooldownMs: number;
}> {
  return {
    clientPath: config.CEC_CLIENT_PATH,
    targetAddress: config.CEC_TARGET_ADDRESS,
    timeoutMs: config.CEC_COMMAND_TIMEOUT_MS,
    cooldownMs: config.CEC_COMMAND_COOLDOWN_MS,
  };
}

/**
 * Button pins. Returns null if the buttons are disabled.
 */
export function getButtonConfig(): Readonly<{
  powerOnPin: number;
  powerOffPin: number;
}> | null {
  if (!config.BUTTONS_ENABLED) {
    return null;
  }

  return {
    powerOnPin: config.BUTTON_POWER_ON_PIN,
    powerOffPin: config.BUTTON_POWER_OFF_PIN,
  };
}

export function getGpioConfig(): Readonly<{
  backend: "pigpio" | "simulated";
}> {
  return {
    backend: config.GPIO_BACKEND,
  };
}

/**
 * Display configuration. Returns null if the display is disabled.
 */
export function getDisplayConfig(): Readonly<{
  driver: "ssd1306" | "log";
  i2cBus: number;
  i2cAddress: number;
  width: number;
  height: 32 | 64;
}> | null {
  if (!config.DISPLAY_ENABLED) {
    return null;
  }

  return {
    driver: config.DISPLAY_DRIVER,
    i2cBus: config.DISPLAY_I2C_BUS,
    i2cAddress: config.DISPLAY_I2C_ADDRESS,
    width: config.DISPLAY_WIDTH,
    height: config.DISPLAY_HEIGHT === 32 ? 32 : 64,
  };
}

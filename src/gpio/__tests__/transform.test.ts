/**
 * GPIO Transform Tests
 */
import { describe, expect, it } from "vitest";

import { formatGpioError, gpioError } from "../errors.js";
import { classifyPigpioError, levelFromDigit } from "../transform.js";

describe("GPIO Transform", () => {
  describe("levelFromDigit", () => {
    it("decodes 0 and 1", () => {
      expect(levelFromDigit(0)).toBe("LOW");
      expect(levelFromDigit(1)).toBe("HIGH");
    });

    it("returns null for anything else", () => {
      expect(levelFromDigit(2)).toBeNull();
      expect(levelFromDigit(-1)).toBeNull();
    });
  });

  describe("classifyPigpioError", () => {
    it("maps initialisation failures to PERMISSION_DENIED", () => {
      expect(classifyPigpioError("pigpio error -1 in gpioInitialise")).toBe(
        "PERMISSION_DENIED",
      );
      expect(classifyPigpioError("EACCES: /dev/gpiomem")).toBe("PERMISSION_DENIED");
    });

    it("maps a bad GPIO number to NOT_AVAILABLE", () => {
      expect(classifyPigpioError("pigpio error -3 in gpioSetMode")).toBe("NOT_AVAILABLE");
    });

    it("falls back to CONFIGURE_FAILED", () => {
      expect(classifyPigpioError("pigpio error -4 in gpioSetPullUpDown")).toBe(
        "CONFIGURE_FAILED",
      );
    });
  });

  describe("formatGpioError", () => {
    it("names the pin and the failure", () => {
      expect(formatGpioError(gpioError("PERMISSION_DENIED", 17, "EACCES"))).toBe(
        "GPIO 17 permission denied: EACCES",
      );
      expect(formatGpioError(gpioError("READ_FAILED", 27, "bad value"))).toBe(
        "GPIO 27 read failed: bad value",
      );
    });
  });
});

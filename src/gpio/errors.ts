/**
 * GPIO Module - Error Types
 *
 * Typed error unions for pin access.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while configuring or reading a pin.
 */
export type GpioError =
  | {
      readonly type: "NOT_AVAILABLE";
      readonly pin: number;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PERMISSION_DENIED";
      readonly pin: number;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONFIGURE_FAILED";
      readonly pin: number;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "READ_FAILED";
      readonly pin: number;
      readonly message: string;
      readonly cause?: Error;
    };

export type GpioErrorType = GpioError["type"];

/**
 * Create a GpioError of the given type.
 */
export function gpioError(
  type: GpioErrorType,
  pin: number,
  message: string,
  cause?: Error,
): GpioError {
  if (cause) {
    return { type, pin, message, cause };
  }
  return { type, pin, message };
}

/**
 * Format a GpioError for logging.
 */
export function formatGpioError(error: GpioError): string {
  switch (error.type) {
    case "NOT_AVAILABLE":
      return `GPIO ${error.pin} not available: ${error.message}`;
    case "PERMISSION_DENIED":
      return `GPIO ${error.pin} permission denied: ${error.message}`;
    case "CONFIGURE_FAILED":
      return `GPIO ${error.pin} configuration failed: ${error.message}`;
    case "READ_FAILED":
      return `GPIO ${error.pin} read failed: ${error.message}`;
  }
}

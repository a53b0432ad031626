/**
 * Display Module - Error Types
 */

export type DisplayError =
  | {
      readonly type: "FONT_LOAD_FAILED";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "BUS_OPEN_FAILED";
      readonly bus: number;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly address: number;
      readonly message: string;
      readonly cause?: Error;
    };

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export function fontLoadFailed(message: string, cause?: unknown): DisplayError {
  return cause === undefined
    ? { type: "FONT_LOAD_FAILED", message }
    : { type: "FONT_LOAD_FAILED", message, cause: toError(cause) };
}

export function busOpenFailed(bus: number, cause: unknown): DisplayError {
  const error = toError(cause);
  return { type: "BUS_OPEN_FAILED", bus, message: error.message, cause: error };
}

export function writeFailed(address: number, cause: unknown): DisplayError {
  const error = toError(cause);
  return { type: "WRITE_FAILED", address, message: error.message, cause: error };
}

const hex = (address: number): string =>
  `0x${address.toString(16).padStart(2, "0").toUpperCase()}`;

/**
 * Format a DisplayError for logging.
 */
export function formatDisplayError(error: DisplayError): string {
  switch (error.type) {
    case "FONT_LOAD_FAILED":
      return `Font could not be loaded: ${error.message}`;
    case "BUS_OPEN_FAILED":
      return `I2C bus ${error.bus} could not be opened: ${error.message}`;
    case "WRITE_FAILED":
      return `Write to display at ${hex(error.address)} failed: ${error.message}`;
  }
}

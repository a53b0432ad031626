/**
 * CEC Module - Error Types
 *
 * Typed error unions for cec-client invocations.
 * Errors are values, not exceptions.
 */

export type CecError =
  | {
      readonly type: "SPAWN_FAILED";
      readonly command: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "COMMAND_FAILED";
      readonly command: string;
      readonly exitCode: number | null;
      readonly message: string;
      readonly output: string;
    }
  | {
      readonly type: "TIMEOUT";
      readonly command: string;
      readonly timeoutMs: number;
      readonly message: string;
    }
  | {
      readonly type: "RATE_LIMITED";
      readonly retryAfterMs: number;
      readonly message: string;
    }
  | {
      readonly type: "INVALID_COMMAND";
      readonly message: string;
    };

export function spawnFailed(
  command: string,
  message: string,
  cause?: Error,
): CecError {
  if (cause) {
    return { type: "SPAWN_FAILED", command, message, cause };
  }
  return { type: "SPAWN_FAILED", command, message };
}

export function commandFailed(
  command: string,
  exitCode: number | null,
  output: string,
): CecError {
  return {
    type: "COMMAND_FAILED",
    command,
    exitCode,
    message: `cec-client exited with code ${exitCode ?? "unknown"}`,
    output,
  };
}

export function timedOut(command: string, timeoutMs: number): CecError {
  return {
    type: "TIMEOUT",
    command,
    timeoutMs,
    message: `cec-client did not finish within ${timeoutMs}ms`,
  };
}

export function rateLimited(retryAfterMs: number): CecError {
  return {
    type: "RATE_LIMITED",
    retryAfterMs,
    message: "Rate limited. Please wait before sending another command.",
  };
}

export function invalidCommand(message: string): CecError {
  return { type: "INVALID_COMMAND", message };
}

/**
 * Format a CecError for logging and API responses.
 */
export function formatCecError(error: CecError): string {
  switch (error.type) {
    case "SPAWN_FAILED":
      return `Cannot run cec-client for "${error.command}": ${error.message}`;
    case "COMMAND_FAILED":
      return `Command "${error.command}" failed: ${error.message}`;
    case "TIMEOUT":
      return `Command "${error.command}" timed out after ${error.timeoutMs}ms`;
    case "RATE_LIMITED":
      return `${error.message} (retry in ${Math.ceil(error.retryAfterMs / 1000)}s)`;
    case "INVALID_COMMAND":
      return `Invalid command: ${error.message}`;
  }
}

/**
 * CEC Module - Service Layer
 *
 * Side effects happen here: one cec-client process per command.
 * Uses Result types for explicit error handling.
 */
import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type CecError,
  commandFailed,
  formatCecError,
  rateLimited,
  spawnFailed,
  timedOut,
} from "./errors.js";
import {
  type CecConfig,
  type CecState,
  INITIAL_CEC_STATE,
  type PowerStatusResult,
  type ScanResult,
} from "./schema.js";
import {
  CEC_CLIENT_ARGS,
  SCAN_COMMAND,
  extractPowerStatus,
  parseScanOutput,
  powerOnCommand,
  powerStatusCommand,
  recordCommand,
  remainingCooldownMs,
  standbyCommand,
  validateCommand,
} from "./transform.js";

const log = createLogger("cec");

// =============================================================================
// Process Boundary
// =============================================================================

/**
 * The parts of a child process the dispatcher uses.
 */
export type CecProcess = {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "close", listener: (code: number | null) => void): unknown;
};

export type SpawnProcess = (
  file: string,
  args: ReadonlyArray<string>,
) => CecProcess;

const spawnCecClient: SpawnProcess = (file, args) =>
  spawn(file, [...args], { stdio: "pipe" });

// =============================================================================
// Dispatcher
// =============================================================================

export type CecDispatcher = Readonly<{
  /** `on <address>`; rate limited */
  powerOn(): Promise<Result<string, CecError>>;
  /** `standby <address>`; rate limited */
  powerOff(): Promise<Result<string, CecError>>;
  getPowerStatus(): Promise<Result<PowerStatusResult, CecError>>;
  scanDevices(): Promise<Result<ScanResult, CecError>>;
  /** Validated free-form command; rate limited */
  sendCommand(command: unknown): Promise<Result<string, CecError>>;
  getState(): CecState;
}>;

export type CecDispatcherOptions = Readonly<{
  spawnProcess?: SpawnProcess;
  now?: () => number;
}>;

export function createCecDispatcher(
  config: CecConfig,
  options: CecDispatcherOptions = {},
): CecDispatcher {
  const spawnProcess = options.spawnProcess ?? spawnCecClient;
  const now = options.now ?? Date.now;

  let state: CecState = INITIAL_CEC_STATE;
  // cec-client owns the adapter while it runs; one at a time
  let queue: Promise<unknown> = Promise.resolve();

  function enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    queue = run;
    return run;
  }

  function execute(command: string): Promise<Result<string, CecError>> {
    return new Promise((resolve) => {
      let settled = false;
      let stdout = "";
      let stderr = "";

      const finish = (result: Result<string, CecError>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      let child: CecProcess;
      try {
        child = spawnProcess(config.clientPath, CEC_CLIENT_ARGS);
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        resolve(err(spawnFailed(command, cause.message, cause)));
        return;
      }

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish(err(timedOut(command, config.timeoutMs)));
      }, config.timeoutMs);

      child.stdout?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.setEncoding("utf8");
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.once("error", (error) => {
        finish(err(spawnFailed(command, error.message, error)));
      });
      child.once("close", (code) => {
        if (code === 0) {
          finish(ok(stdout));
        } else {
          finish(err(commandFailed(command, code, `${stdout}${stderr}`)));
        }
      });

      child.stdin?.once("error", (error) => {
        // EPIPE when cec-client exits before reading; close reports the outcome
        log.debug({ command, error: error.message }, "cec-client stdin closed early");
      });
      child.stdin?.end(`${command}\n`);
    });
  }

  async function run(command: string): Promise<Result<string, CecError>> {
    return enqueue(async () => {
      const startTime = Date.now();
      logOperationStart(log, "cecCommand", { command });

      const result = await execute(command);

      if (result.isOk()) {
        logOperationComplete(log, "cecCommand", startTime, { command });
        log.debug({ command, output: result.value }, "CEC response");
      } else {
        logOperationFailed(log, "cecCommand", formatCecError(result.error), {
          command,
          errorType: result.error.type,
        });
      }
      return result;
    });
  }

  /**
   * Anti-loop protection shared by power and custom commands.
   */
  function acquireCooldown(command: string): Result<true, CecError> {
    const time = now();
    const remaining = remainingCooldownMs(state.lastCommandTime, time, config.cooldownMs);
    if (remaining > 0) {
      log.warn({ command, retryAfterMs: remaining }, "Command rate limited to prevent looping");
      return err(rateLimited(remaining));
    }
    state = recordCommand(state, command, time);
    return ok(true);
  }

  async function runRateLimited(command: string): Promise<Result<string, CecError>> {
    const allowed = acquireCooldown(command);
    if (allowed.isErr()) {
      return err(allowed.error);
    }
    return run(command);
  }

  return {
    powerOn: () => {
      log.info({ address: config.targetAddress }, "Sending power ON command");
      return runRateLimited(powerOnCommand(config.targetAddress));
    },

    powerOff: () => {
      log.info({ address: config.targetAddress }, "Sending power OFF command");
      return runRateLimited(standbyCommand(config.targetAddress));
    },

    getPowerStatus: async () => {
      log.info("Getting power status");
      const result = await run(powerStatusCommand(config.targetAddress));
      return result.map((output) => ({ output, power: extractPowerStatus(output) }));
    },

    scanDevices: async () => {
      log.info("Scanning for CEC devices");
      const result = await run(SCAN_COMMAND);
      return result.map((output) => ({ output, devices: parseScanOutput(output) }));
    },

    sendCommand: async (raw) => {
      const command = validateCommand(raw);
      if (command.isErr()) {
        return err(command.error);
      }
      log.info({ command: command.value }, "Sending custom command");
      return runRateLimited(command.value);
    },

    getState: () => state,
  };
}

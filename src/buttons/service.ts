/**
 * Buttons Module - Service Layer
 *
 * Polls the ON/OFF push buttons, detects debounced presses and runs the
 * bound actions. One monitor owns its pin source; there is no module state.
 */
import { type Result, err, ok } from "neverthrow";

import { type PinLevel, type PinSource, formatGpioError } from "../gpio/index.js";
import { createLogger } from "../logger.js";
import {
  type ButtonMonitorError,
  alreadyRunning,
  formatButtonMonitorError,
  startFailed,
} from "./errors.js";
import {
  BUTTON_DEBOUNCE_MS,
  BUTTON_IDS,
  BUTTON_POLL_INTERVAL_MS,
  type ButtonActions,
  type ButtonId,
  type ButtonPins,
  type MonitorSession,
  type MonitorSnapshot,
} from "./schema.js";
import {
  createSession,
  endSession,
  evaluateTick,
  toSnapshot,
} from "./transform.js";

const log = createLogger("buttons");

export type ButtonMonitorOptions = Readonly<{
  pinSource: PinSource;
  pins: ButtonPins;
  actions: ButtonActions;
  pollIntervalMs?: number;
  debounceMs?: number;
  /** Monotonic clock used for debounce; performance.now by default */
  now?: () => number;
  /** Wall clock the snapshot times are reported in; Date.now by default */
  wallClock?: () => number;
}>;

export type ButtonMonitor = Readonly<{
  /**
   * Configure both pins, seed their levels and start polling in the
   * background. Resolves once polling has started, or with the start error.
   */
  start(): Promise<Result<true, ButtonMonitorError>>;
  /**
   * Ask the loop to stop and wait for it. No action runs after this is called.
   */
  stop(): Promise<void>;
  isRunning(): boolean;
  getSession(): MonitorSession | null;
  getSnapshot(): MonitorSnapshot;
}>;

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function createButtonMonitor(options: ButtonMonitorOptions): ButtonMonitor {
  const { pinSource, pins, actions } = options;
  const pollIntervalMs = options.pollIntervalMs ?? BUTTON_POLL_INTERVAL_MS;
  const debounceMs = options.debounceMs ?? BUTTON_DEBOUNCE_MS;
  const now = options.now ?? (() => performance.now());
  const wallClock = options.wallClock ?? Date.now;

  let session: MonitorSession | null = null;
  let stopRequested = false;
  let loop: Promise<void> | null = null;
  // Buttons whose reads are failing; logged on the transitions only
  const failingReads = new Set<ButtonId>();

  function releaseAll(): void {
    for (const button of BUTTON_IDS) {
      pinSource.release(pins[button]);
    }
  }

  // ===========================================================================
  // Start-up (errors propagate to the caller)
  // ===========================================================================

  function initialize(): Result<Record<ButtonId, PinLevel>, ButtonMonitorError> {
    for (const button of BUTTON_IDS) {
      const configured = pinSource.configureInput(pins[button]);
      if (configured.isErr()) {
        return err(startFailed(button, pins[button], configured.error));
      }
    }

    const levels: Record<ButtonId, PinLevel> = { ON: "LOW", OFF: "LOW" };
    for (const button of BUTTON_IDS) {
      const level = pinSource.readLevel(pins[button]);
      if (level.isErr()) {
        return err(startFailed(button, pins[button], level.error));
      }
      levels[button] = level.value;
    }

    return ok(levels);
  }

  // ===========================================================================
  // Steady state (errors are logged, the loop keeps going)
  // ===========================================================================

  function readLevels(): Partial<Record<ButtonId, PinLevel>> {
    const levels: Partial<Record<ButtonId, PinLevel>> = {};

    for (const button of BUTTON_IDS) {
      const result = pinSource.readLevel(pins[button]);
      if (result.isOk()) {
        levels[button] = result.value;
        if (failingReads.delete(button)) {
          log.info({ button, pin: pins[button] }, "Button read recovered");
        }
      } else if (!failingReads.has(button)) {
        failingReads.add(button);
        log.warn(
          { button, pin: pins[button], error: formatGpioError(result.error) },
          "Button read failing",
        );
      }
    }

    return levels;
  }

  async function dispatch(button: ButtonId, pressCount: number): Promise<void> {
    const action = button === "ON" ? "power_on" : "power_off";
    log.info({ button, pin: pins[button], pressCount }, `Power ${button} button pressed`);

    try {
      await actions[button]();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(
        { button, pin: pins[button], action, error: message },
        "Button action failed",
      );
    }
  }

  async function pollOnce(): Promise<void> {
    if (!session) return;

    const outcome = evaluateTick(session, readLevels(), now(), debounceMs);
    session = outcome.session;

    for (const button of outcome.triggered) {
      if (stopRequested) return;
      await dispatch(button, outcome.session.pressCounts[button]);
    }
  }

  async function run(): Promise<void> {
    while (!stopRequested) {
      await sleep(pollIntervalMs);
      if (stopRequested) break;

      try {
        await pollOnce();
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        log.error({ error: message }, "Error in poll cycle");
      }
    }
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  async function start(): Promise<Result<true, ButtonMonitorError>> {
    if (loop) {
      log.warn("Button monitor already running");
      return err(alreadyRunning());
    }

    const initialized = initialize();
    if (initialized.isErr()) {
      log.error(
        { error: formatButtonMonitorError(initialized.error) },
        "Button monitor failed to start",
      );
      releaseAll();
      return err(initialized.error);
    }

    session = createSession(initialized.value, now(), wallClock());
    stopRequested = false;
    failingReads.clear();

    log.info(
      {
        backend: pinSource.backend,
        pins,
        levels: initialized.value,
        pollIntervalMs,
        debounceMs,
      },
      "Button monitor started",
    );

    loop = run();
    return ok(true);
  }

  async function stop(): Promise<void> {
    if (!loop) {
      log.warn("Button monitor not running");
      return;
    }

    log.info("Stopping button monitor...");
    stopRequested = true;
    await loop;
    loop = null;

    releaseAll();
    if (session) {
      session = endSession(session);
    }
    log.info({ pressCounts: session?.pressCounts }, "Button monitor stopped");
  }

  return {
    start,
    stop,
    isRunning: () => loop !== null && !stopRequested,
    getSession: () => session,
    getSnapshot: () => toSnapshot(session, pins, pollIntervalMs, debounceMs),
  };
}

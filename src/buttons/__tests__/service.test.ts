/**
 * Button Monitor Service Tests
 *
 * Runs the real polling loop against a simulated pin source with fake timers.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

const logger = vi.hoisted(() => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => logger,
}));

import {
  type SimulatedPinSource,
  createSimulatedPinSource,
} from "../../gpio/index.js";
import { type ButtonMonitor, createButtonMonitor } from "../service.js";

const ON_PIN = 17;
const OFF_PIN = 27;

describe("Button Monitor", () => {
  let source: SimulatedPinSource;
  let onAction: ReturnType<typeof vi.fn>;
  let offAction: ReturnType<typeof vi.fn>;
  let monitor: ButtonMonitor;

  /** Advance one poll interval with the given levels on the pins */
  async function tick(levels: { on?: "LOW" | "HIGH"; off?: "LOW" | "HIGH" } = {}) {
    if (levels.on) source.setLevel(ON_PIN, levels.on);
    if (levels.off) source.setLevel(OFF_PIN, levels.off);
    await vi.advanceTimersByTimeAsync(50);
  }

  async function stopMonitor() {
    const stopped = monitor.stop();
    await vi.advanceTimersByTimeAsync(50);
    await stopped;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.setSystemTime(0);
    source = createSimulatedPinSource();
    onAction = vi.fn();
    offAction = vi.fn();
    monitor = createButtonMonitor({
      pinSource: source,
      pins: { ON: ON_PIN, OFF: OFF_PIN },
      actions: { ON: onAction, OFF: offAction },
      // Fake timers drive Date
      now: () => Date.now(),
    });
  });

  afterEach(async () => {
    if (monitor.isRunning()) {
      await stopMonitor();
    }
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  // ===========================================================================
  // Start-up
  // ===========================================================================

  describe("start", () => {
    test("configures both pins and starts polling", async () => {
      const result = await monitor.start();

      expect(result.isOk()).toBe(true);
      expect(monitor.isRunning()).toBe(true);
      expect(source.isConfigured(ON_PIN)).toBe(true);
      expect(source.isConfigured(OFF_PIN)).toBe(true);
    });

    test("returns START_FAILED and never polls when a pin cannot be configured", async () => {
      source.failConfigure(OFF_PIN, "PERMISSION_DENIED");

      const result = await monitor.start();

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("START_FAILED");
      if (error.type === "START_FAILED") {
        expect(error.button).toBe("OFF");
        expect(error.pin).toBe(OFF_PIN);
        expect(error.cause.type).toBe("PERMISSION_DENIED");
      }
      expect(monitor.isRunning()).toBe(false);
      expect(source.isConfigured(ON_PIN)).toBe(false);

      source.setLevel(ON_PIN, "HIGH");
      await vi.advanceTimersByTimeAsync(500);
      expect(onAction).not.toHaveBeenCalled();
    });

    test("returns START_FAILED when the seed read fails", async () => {
      source.failReads(ON_PIN, true);

      const result = await monitor.start();

      expect(result._unsafeUnwrapErr().type).toBe("START_FAILED");
      expect(monitor.isRunning()).toBe(false);
    });

    test("returns ALREADY_RUNNING on a second start", async () => {
      await monitor.start();

      const second = await monitor.start();

      expect(second._unsafeUnwrapErr().type).toBe("ALREADY_RUNNING");
    });
  });

  // ===========================================================================
  // Polling
  // ===========================================================================

  describe("polling", () => {
    test("dispatches the ON action on a rising edge", async () => {
      await monitor.start();

      await tick({ on: "HIGH" });

      expect(onAction).toHaveBeenCalledTimes(1);
      expect(offAction).not.toHaveBeenCalled();
      expect(monitor.getSession()?.pressCounts).toEqual({ ON: 1, OFF: 0 });
    });

    test("samples LOW, HIGH, HIGH, LOW, HIGH dispatch exactly once", async () => {
      await monitor.start();

      await tick({ on: "HIGH" });
      await tick({ on: "HIGH" });
      await tick({ on: "LOW" });
      await tick({ on: "HIGH" });

      expect(onAction).toHaveBeenCalledTimes(1);
      expect(monitor.getSession()?.lastTriggerAt.ON).toBe(50);
    });

    test("dispatches twice for presses more than 300ms apart", async () => {
      await monitor.start();

      await tick({ on: "HIGH" }); // t=50
      await tick({ on: "LOW" }); // t=100
      await vi.advanceTimersByTimeAsync(250); // t=350
      await tick({ on: "HIGH" }); // t=400

      expect(onAction).toHaveBeenCalledTimes(2);
      expect(monitor.getSession()?.pressCounts.ON).toBe(2);
    });

    test("ignores a pin that is already HIGH at start", async () => {
      source.setLevel(ON_PIN, "HIGH");
      await monitor.start();

      await tick();
      await tick();

      expect(onAction).not.toHaveBeenCalled();

      await tick({ on: "LOW" });
      await tick({ on: "HIGH" });

      expect(onAction).toHaveBeenCalledTimes(1);
    });

    test("dispatches the OFF action for the OFF pin", async () => {
      await monitor.start();

      await tick({ off: "HIGH" });

      expect(offAction).toHaveBeenCalledTimes(1);
      expect(onAction).not.toHaveBeenCalled();
    });

    test("keeps polling after an action throws and still counts the press", async () => {
      onAction.mockImplementation(() => {
        throw new Error("cec-client exited with code 1");
      });
      await monitor.start();

      await tick({ on: "HIGH" }); // t=50
      await tick({ on: "LOW" }); // t=100
      await vi.advanceTimersByTimeAsync(250); // t=350
      await tick({ on: "HIGH" }); // t=400

      expect(onAction).toHaveBeenCalledTimes(2);
      expect(monitor.getSession()?.pressCounts.ON).toBe(2);
      expect(monitor.isRunning()).toBe(true);
    });

    test("keeps polling after an action rejects", async () => {
      offAction.mockRejectedValue(new Error("timeout"));
      await monitor.start();

      await tick({ off: "HIGH" });
      await tick({ on: "HIGH" });

      expect(offAction).toHaveBeenCalledTimes(1);
      expect(onAction).toHaveBeenCalledTimes(1);
    });

    test("awaits a slow action before polling again", async () => {
      let finish: () => void = () => undefined;
      onAction.mockImplementation(
        () =>
          new Promise<void>((resolve) => {
            finish = resolve;
          }),
      );
      await monitor.start();

      await tick({ on: "HIGH" }); // t=50, action pending
      await tick({ off: "HIGH" }); // no poll while the action runs

      expect(offAction).not.toHaveBeenCalled();

      finish();
      await tick();

      expect(offAction).toHaveBeenCalledTimes(1);
    });

    test("skips a pin whose read fails and still evaluates the other", async () => {
      await monitor.start();
      source.failReads(ON_PIN, true);

      await tick({ on: "HIGH", off: "HIGH" });

      expect(onAction).not.toHaveBeenCalled();
      expect(offAction).toHaveBeenCalledTimes(1);

      source.failReads(ON_PIN, false);
      await tick();

      expect(onAction).toHaveBeenCalledTimes(1);
    });

    test("warns once while a read keeps failing and logs the recovery", async () => {
      await monitor.start();
      logger.warn.mockClear();
      source.failReads(ON_PIN, true);

      await vi.advanceTimersByTimeAsync(1000);

      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ button: "ON", pin: ON_PIN }),
        "Button read failing",
      );

      source.failReads(ON_PIN, false);
      await tick();
      source.failReads(ON_PIN, true);
      await tick();

      expect(logger.info).toHaveBeenCalledWith(
        { button: "ON", pin: ON_PIN },
        "Button read recovered",
      );
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });
  });

  // ===========================================================================
  // Clocks
  // ===========================================================================

  describe("clocks", () => {
    test("debounces on performance.now by default", async () => {
      const clock = vi.spyOn(performance, "now").mockReturnValue(10_000);
      const defaultClockMonitor = createButtonMonitor({
        pinSource: source,
        pins: { ON: ON_PIN, OFF: OFF_PIN },
        actions: { ON: onAction, OFF: offAction },
      });
      await defaultClockMonitor.start();

      clock.mockReturnValue(10_050);
      await tick({ on: "HIGH" });

      expect(defaultClockMonitor.getSession()?.lastTriggerAt.ON).toBe(10_050);

      const stopped = defaultClockMonitor.stop();
      await vi.advanceTimersByTimeAsync(50);
      await stopped;
    });

    test("keeps debouncing when the wall clock jumps backwards", async () => {
      let wall = Date.UTC(2026, 0, 1);
      const jumpingMonitor = createButtonMonitor({
        pinSource: source,
        pins: { ON: ON_PIN, OFF: OFF_PIN },
        actions: { ON: onAction, OFF: offAction },
        now: () => Date.now(),
        wallClock: () => wall,
      });
      await jumpingMonitor.start();

      await tick({ on: "HIGH" }); // t=50
      wall -= 3_600_000;
      await tick({ on: "LOW" }); // t=100
      await vi.advanceTimersByTimeAsync(250); // t=350
      await tick({ on: "HIGH" }); // t=400

      expect(onAction).toHaveBeenCalledTimes(2);
      expect(jumpingMonitor.getSnapshot().startedAt).toBe("2026-01-01T00:00:00.000Z");
      expect(jumpingMonitor.getSnapshot().lastTriggerAt.ON).toBe("2026-01-01T00:00:00.400Z");

      const stopped = jumpingMonitor.stop();
      await vi.advanceTimersByTimeAsync(50);
      await stopped;
    });
  });

  // ===========================================================================
  // Stop
  // ===========================================================================

  describe("stop", () => {
    test("no dispatch happens after stop even if levels keep changing", async () => {
      await monitor.start();

      const stopped = monitor.stop();
      source.setLevel(ON_PIN, "HIGH");
      source.setLevel(OFF_PIN, "HIGH");
      await vi.advanceTimersByTimeAsync(100);
      await stopped;

      expect(onAction).not.toHaveBeenCalled();
      expect(offAction).not.toHaveBeenCalled();
      expect(monitor.isRunning()).toBe(false);
      expect(monitor.getSession()?.isRunning).toBe(false);
    });

    test("does not dispatch a second button once stop is called mid-tick", async () => {
      let finish: () => void = () => undefined;
      onAction.mockImplementation(
        () =>
          new Promise<void>((resolve) => {
            finish = resolve;
          }),
      );
      await monitor.start();

      await tick({ on: "HIGH", off: "HIGH" }); // ON action pending, OFF queued
      const stopped = monitor.stop();
      finish();
      await vi.advanceTimersByTimeAsync(50);
      await stopped;

      expect(onAction).toHaveBeenCalledTimes(1);
      expect(offAction).not.toHaveBeenCalled();
      expect(monitor.getSession()?.pressCounts).toEqual({ ON: 1, OFF: 1 });
    });

    test("releases both pins", async () => {
      await monitor.start();

      await stopMonitor();

      expect(source.isConfigured(ON_PIN)).toBe(false);
      expect(source.isConfigured(OFF_PIN)).toBe(false);
    });

    test("keeps the press counts of the finished session", async () => {
      await monitor.start();
      await tick({ on: "HIGH" });

      await stopMonitor();

      expect(monitor.getSnapshot().pressCounts).toEqual({ ON: 1, OFF: 0 });
      expect(monitor.getSnapshot().isRunning).toBe(false);
    });

    test("can be started again after stopping", async () => {
      await monitor.start();
      await stopMonitor();

      const restarted = await monitor.start();

      expect(restarted.isOk()).toBe(true);
      expect(monitor.getSession()?.pressCounts).toEqual({ ON: 0, OFF: 0 });
    });
  });
});

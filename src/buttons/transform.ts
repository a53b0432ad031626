/**
 * Buttons Module - Pure Transformations
 *
 * Edge detection and debounce. Each function takes the time it needs as a
 * parameter; nothing here reads a clock.
 */
import type { PinLevel } from "../gpio/index.js";
import {
  BUTTON_IDS,
  type ButtonId,
  type ButtonPins,
  type MonitorSession,
  type MonitorSnapshot,
  type TickLevels,
} from "./schema.js";

/**
 * LOW on the previous sample, HIGH on this one.
 */
export function isRisingEdge(previous: PinLevel, current: PinLevel): boolean {
  return previous === "LOW" && current === "HIGH";
}

/**
 * True when more than `windowMs` has passed since the last accepted trigger.
 * A button that never triggered is always outside the window.
 */
export function isOutsideDebounceWindow(
  lastTriggerAt: number | null,
  now: number,
  windowMs: number,
): boolean {
  return lastTriggerAt === null || now - lastTriggerAt > windowMs;
}

/**
 * Session seeded from the levels read at start. `now` is a reading of the
 * debounce clock, `startedAt` the wall-clock time of the same moment.
 */
export function createSession(
  initialLevels: Readonly<Record<ButtonId, PinLevel>>,
  now: number,
  startedAt: number = now,
): MonitorSession {
  return {
    pressCounts: { ON: 0, OFF: 0 },
    lastTriggerAt: { ON: null, OFF: null },
    previousLevels: { ...initialLevels },
    isRunning: true,
    startedAt,
    clockOrigin: now,
    lastPollTime: null,
  };
}

export type TickOutcome = Readonly<{
  session: MonitorSession;
  /** Buttons whose action must run, in ON, OFF order */
  triggered: ReadonlyArray<ButtonId>;
}>;

/**
 * Apply one tick of samples to the session.
 *
 * A button triggers on a rising edge outside its own debounce window; the
 * ON and OFF timers are independent. Previous levels are updated whether or
 * not anything triggered. A button missing from `levels` (failed read) keeps
 * its previous level.
 */
export function evaluateTick(
  session: MonitorSession,
  levels: TickLevels,
  now: number,
  debounceMs: number,
): TickOutcome {
  const pressCounts = { ...session.pressCounts };
  const lastTriggerAt = { ...session.lastTriggerAt };
  const previousLevels = { ...session.previousLevels };
  const triggered: ButtonId[] = [];

  for (const button of BUTTON_IDS) {
    const current = levels[button];
    if (current === undefined) continue;

    if (
      isRisingEdge(session.previousLevels[button], current) &&
      isOutsideDebounceWindow(session.lastTriggerAt[button], now, debounceMs)
    ) {
      pressCounts[button] += 1;
      lastTriggerAt[button] = now;
      triggered.push(button);
    }

    previousLevels[button] = current;
  }

  return {
    session: {
      ...session,
      pressCounts,
      lastTriggerAt,
      previousLevels,
      lastPollTime: now,
    },
    triggered,
  };
}

/**
 * Mark the session as stopped.
 */
export function endSession(session: MonitorSession): MonitorSession {
  return { ...session, isRunning: false };
}

const toIso = (time: number | null): string | null =>
  time === null ? null : new Date(time).toISOString();

/**
 * Serializable view for the HTTP API. Debounce clock readings are reported
 * as wall-clock times relative to the start of the session.
 */
export function toSnapshot(
  session: MonitorSession | null,
  pins: ButtonPins,
  pollIntervalMs: number,
  debounceMs: number,
): MonitorSnapshot {
  const toWallIso = (time: number | null): string | null =>
    session === null || time === null
      ? null
      : toIso(session.startedAt + (time - session.clockOrigin));

  return {
    isRunning: session?.isRunning ?? false,
    pins,
    pollIntervalMs,
    debounceMs,
    pressCounts: session?.pressCounts ?? { ON: 0, OFF: 0 },
    lastTriggerAt: {
      ON: toWallIso(session?.lastTriggerAt.ON ?? null),
      OFF: toWallIso(session?.lastTriggerAt.OFF ?? null),
    },
    levels: session?.previousLevels ?? { ON: "LOW", OFF: "LOW" },
    startedAt: toIso(session?.startedAt ?? null),
    lastPollTime: toWallIso(session?.lastPollTime ?? null),
  };
}

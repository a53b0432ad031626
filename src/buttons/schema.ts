/**
 * Buttons Module - Schemas and Types
 *
 * State of the push-button monitor. Nothing here is persisted; a session
 * lives from start() to stop().
 */
import type { PinLevel } from "../gpio/index.js";

// =============================================================================
// Timing
// =============================================================================

export const BUTTON_POLL_INTERVAL_MS = 50;

/** Minimum time after an accepted press before the same button fires again */
export const BUTTON_DEBOUNCE_MS = 300;

// =============================================================================
// Buttons
// =============================================================================

export const BUTTON_IDS = ["ON", "OFF"] as const;

export type ButtonId = (typeof BUTTON_IDS)[number];

export type ButtonPins = Readonly<Record<ButtonId, number>>;

/**
 * Action bound to a button. The monitor awaits it before polling again.
 */
export type ButtonAction = () => void | Promise<void>;

export type ButtonActions = Readonly<Record<ButtonId, ButtonAction>>;

/**
 * Levels read in one tick. A button is absent when its read failed.
 */
export type TickLevels = Readonly<Partial<Record<ButtonId, PinLevel>>>;

// =============================================================================
// Monitor Session
// =============================================================================

export type MonitorSession = Readonly<{
  /** Accepted presses per button; never decreases while running */
  pressCounts: Readonly<Record<ButtonId, number>>;
  /** Time of the last accepted press per button (null = never) */
  lastTriggerAt: Readonly<Record<ButtonId, number | null>>;
  /** Level seen on the previous tick, for edge detection */
  previousLevels: Readonly<Record<ButtonId, PinLevel>>;
  isRunning: boolean;
  /** Wall-clock time of start */
  startedAt: number;
  /** Debounce clock reading at start; the other times are on this clock */
  clockOrigin: number;
  lastPollTime: number | null;
}>;

/**
 * Public, serializable view of a session.
 */
export type MonitorSnapshot = Readonly<{
  isRunning: boolean;
  pins: ButtonPins;
  pollIntervalMs: number;
  debounceMs: number;
  pressCounts: Readonly<Record<ButtonId, number>>;
  lastTriggerAt: Readonly<Record<ButtonId, string | null>>;
  levels: Readonly<Record<ButtonId, PinLevel>>;
  startedAt: string | null;
  lastPollTime: string | null;
}>;

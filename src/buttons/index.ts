/**
 * Buttons Module - Public API
 */

// Types
export type {
  ButtonAction,
  ButtonActions,
  ButtonId,
  ButtonPins,
  MonitorSession,
  MonitorSnapshot,
} from "./schema.js";
export type { ButtonMonitorError } from "./errors.js";
export type { ButtonMonitor, ButtonMonitorOptions } from "./service.js";

export { BUTTON_DEBOUNCE_MS, BUTTON_POLL_INTERVAL_MS } from "./schema.js";

// Error utilities
export { formatButtonMonitorError } from "./errors.js";

// Service
export { createButtonMonitor } from "./service.js";

// Pure transformations
export {
  evaluateTick,
  isOutsideDebounceWindow,
  isRisingEdge,
} from "./transform.js";

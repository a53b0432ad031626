/**
 * Control Module - Public API
 */

// Types
export type { CommandSource, PowerCommandOutcome } from "./schema.js";
export type { PowerControl, PowerControlOptions, PowerEvents } from "./service.js";

// Service
export { createPowerControl } from "./service.js";

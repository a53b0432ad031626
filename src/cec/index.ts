/**
 * CEC Module - Public API
 */

// Types
export type {
  CecConfig,
  CecDevice,
  CecState,
  CustomCommandRequest,
  PowerAction,
  PowerStatusResult,
  ScanResult,
  TvPowerStatus,
} from "./schema.js";
export type { CecError } from "./errors.js";
export type {
  CecDispatcher,
  CecDispatcherOptions,
  CecProcess,
  SpawnProcess,
} from "./service.js";

// Schemas
export { CecCommandSchema, CustomCommandRequestSchema } from "./schema.js";

// Error utilities
export { formatCecError } from "./errors.js";

// Service
export { createCecDispatcher } from "./service.js";

// Pure transformations
export {
  extractPowerStatus,
  parseScanOutput,
  validateCommand,
} from "./transform.js";

/**
 * Display Module - Public API
 */

// Types
export type {
  DisplayConfig,
  DisplayDriver,
  Font,
  FrameBuffer,
  Screen,
} from "./schema.js";
export type { DisplayError } from "./errors.js";
export type { DisplayService, DisplayServiceOptions } from "./service.js";

// Error utilities
export { formatDisplayError } from "./errors.js";

// Service
export {
  createDisabledDisplay,
  createDisplayDriver,
  createDisplayService,
} from "./service.js";
export { loadFont } from "./font.js";

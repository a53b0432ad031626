/**
 * SSE Module - Public API
 */

// Types
export type { ButtonPressEvent, PowerCommandEvent, SseEvent } from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastButtonPress,
  broadcastPowerCommand,
  createSseStream,
  disconnectAllClients,
  encodeEvent,
  getClientCount,
  removeClient,
} from "./service.js";

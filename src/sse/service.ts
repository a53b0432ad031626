/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting for real-time UI updates.
 */
import type { ButtonId } from "../buttons/index.js";
import type { PowerAction } from "../cec/index.js";
import type { CommandSource } from "../control/schema.js";
import { createLogger } from "../logger.js";
import type { SseEvent } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

/**
 * Wire format of one event.
 */
export function encodeEvent(type: string, data: unknown): Uint8Array {
  return encoder.encode(`event: ${type}\ndata: ${JSON.stringify(data)}\n\n`);
}

// =============================================================================
// Client Management
// =============================================================================

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;

/**
 * Get count of connected clients.
 */
export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client.
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      clients.push({ id: clientId, controller, connected: true });
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      controller.enqueue(encodeEvent("connected", { clientId }));
    },
    cancel() {
      removeClient(clientId);
    },
  });

  return { stream, clientId };
}

/**
 * Remove a client by ID.
 */
export function removeClient(clientId: number): void {
  const client = clients.find((c) => c.id === clientId);
  if (client) {
    client.connected = false;
    clients = clients.filter((c) => c.id !== clientId);
    log.info(
      { clientId, remainingClients: getClientCount() },
      "SSE client disconnected",
    );
  }
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients. Clients whose stream has
 * gone away are dropped.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.debug({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encodeEvent(event.type, event);

  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch (error) {
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE client stream closed",
      );
      client.connected = false;
      errorCount++;
    }
  }

  if (errorCount > 0) {
    clients = clients.filter((c) => c.connected);
    log.debug(
      { eventType: event.type, sent: successCount, failed: errorCount },
      "Broadcast complete with disconnections",
    );
  }

  log.debug(
    { eventType: event.type, clients: successCount },
    "Event broadcasted",
  );
}

export function broadcastPowerCommand(
  action: PowerAction,
  source: CommandSource,
  success: boolean,
  message: string,
): void {
  broadcast({ type: "power_command", action, source, success, message });
}

export function broadcastButtonPress(button: ButtonId, pressCount: number): void {
  broadcast({ type: "button_press", button, pressCount });
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch (error) {
      log.debug(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE client already closed",
      );
    }
  }

  clients = [];
}

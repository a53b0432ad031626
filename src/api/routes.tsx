/**
 * API routes for CEC Remote.
 *
 * - /api/health, /api/version - Service info
 * - /api/scan, /api/status - CEC queries
 * - /api/power/*, /api/command - CEC commands
 * - /api/buttons - Button Monitor snapshot
 * - /api/events - SSE stream for real-time updates
 * - / - Dashboard UI
 *
 * Command routes answer htmx requests with an activity log fragment and
 * everything else with JSON.
 */
import { type Context, Hono } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Result } from "neverthrow";

import type { ButtonMonitor } from "../buttons/index.js";
import {
  type CecDevice,
  type CecDispatcher,
  type CecError,
  formatCecError,
} from "../cec/index.js";
import type { PowerControl } from "../control/index.js";
import type { DisplayService } from "../display/index.js";
import { createLogger } from "../logger.js";
import { createSseStream, getClientCount, removeClient } from "../sse/index.js";
import { CommandResult } from "../ui/components/CommandResult.js";
import { Dashboard } from "../ui/pages/Dashboard.js";

const log = createLogger("api");

export type RouteDeps = Readonly<{
  appName: string;
  version: string;
  targetAddress: string;
  cec: Pick<CecDispatcher, "getPowerStatus" | "scanDevices" | "sendCommand">;
  control: Pick<PowerControl, "powerOn" | "powerOff">;
  display: Pick<DisplayService, "isReady">;
  /** null when the physical buttons are disabled */
  monitor: Pick<ButtonMonitor, "getSnapshot" | "isRunning"> | null;
}>;

/**
 * HTTP status for a failed CEC operation.
 */
export function statusForCecError(error: CecError): ContentfulStatusCode {
  switch (error.type) {
    case "INVALID_COMMAND":
      return 400;
    case "RATE_LIMITED":
      return 429;
    case "SPAWN_FAILED":
    case "COMMAND_FAILED":
    case "TIMEOUT":
      return 502;
  }
}

const isHtmx = (c: Context): boolean => c.req.header("HX-Request") === "true";

/**
 * Command body: JSON `{ command }` or a form field.
 */
async function readCommand(c: Context): Promise<unknown> {
  const contentType = c.req.header("content-type") ?? "";

  if (contentType.includes("application/json")) {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      log.debug(
        { requestId: c.get("requestId"), error: error instanceof Error ? error.message : String(error) },
        "Command body is not valid JSON",
      );
      return undefined;
    }
    return typeof body === "object" && body !== null && "command" in body
      ? body.command
      : undefined;
  }

  const form = await c.req.parseBody();
  return form["command"];
}

type SuccessReply = {
  message: string;
  output: string;
  devices?: ReadonlyArray<CecDevice>;
  body: Record<string, unknown>;
};

export function createRoutes(deps: RouteDeps): Hono {
  const { cec, control, display, monitor } = deps;
  const routes = new Hono();

  /**
   * Shared reply for command routes.
   */
  function reply<T>(
    c: Context,
    label: string,
    result: Result<T, CecError>,
    onSuccess: (value: T) => SuccessReply,
  ): Response | Promise<Response> {
    const requestId = c.get("requestId");
    const timestamp = new Date();

    if (result.isErr()) {
      const message = formatCecError(result.error);
      log.warn({ requestId, label, errorType: result.error.type }, message);

      if (isHtmx(c)) {
        return c.html(
          <CommandResult
            label={label}
            success={false}
            message={message}
            timestamp={timestamp}
            requestId={requestId}
          />,
        );
      }
      return c.json({ status: "error", message, requestId }, statusForCecError(result.error));
    }

    const success = onSuccess(result.value);
    if (isHtmx(c)) {
      return c.html(
        <CommandResult
          label={label}
          success={true}
          message={success.message}
          output={success.output}
          devices={success.devices}
          timestamp={timestamp}
        />,
      );
    }
    return c.json({ status: "success", ...success.body });
  }

  // ===========================================================================
  // Service Info
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: deps.version,
      features: {
        buttons: monitor?.isRunning() ?? false,
        display: display.isReady(),
      },
      sseClients: getClientCount(),
    });
  });

  routes.get("/api/version", (c) => c.json({ version: deps.version }));

  // ===========================================================================
  // CEC Queries
  // ===========================================================================

  routes.get("/api/scan", async (c) => {
    log.info({ requestId: c.get("requestId") }, "GET /api/scan");
    const result = await cec.scanDevices();

    return reply(c, "Scan", result, ({ output, devices }) => ({
      message: `Found ${devices.length} device(s)`,
      output,
      devices,
      body: { result: output, devices },
    }));
  });

  routes.get("/api/status", async (c) => {
    log.info({ requestId: c.get("requestId") }, "GET /api/status");
    const result = await cec.getPowerStatus();

    return reply(c, "Power status", result, ({ output, power }) => ({
      message: `TV power: ${power}`,
      output,
      body: { result: output, power },
    }));
  });

  // ===========================================================================
  // CEC Commands
  // ===========================================================================

  routes.post("/api/power/on", async (c) => {
    log.info({ requestId: c.get("requestId") }, "POST /api/power/on");
    const result = await control.powerOn("web");

    return reply(c, "Power ON", result, (output) => ({
      message: "Power ON command sent",
      output,
      body: { result: output },
    }));
  });

  routes.post("/api/power/off", async (c) => {
    log.info({ requestId: c.get("requestId") }, "POST /api/power/off");
    const result = await control.powerOff("web");

    return reply(c, "Power OFF", result, (output) => ({
      message: "Power OFF command sent",
      output,
      body: { result: output },
    }));
  });

  routes.post("/api/command", async (c) => {
    const requestId = c.get("requestId");
    const command = await readCommand(c);
    log.info({ requestId, command }, "POST /api/command");

    const result = await cec.sendCommand(command);
    const label = typeof command === "string" && command.trim() ? command.trim() : "Command";

    return reply(c, label, result, (output) => ({
      message: "Command sent",
      output,
      body: { result: output },
    }));
  });

  // ===========================================================================
  // Buttons
  // ===========================================================================

  routes.get("/api/buttons", (c) => {
    if (!monitor) {
      return c.json({ enabled: false });
    }
    return c.json({ enabled: true, ...monitor.getSnapshot() });
  });

  // ===========================================================================
  // Server-Sent Events Stream
  // ===========================================================================

  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    const { stream, clientId } = createSseStream();
    log.info({ requestId, clientId }, "SSE client connecting");

    c.req.raw.signal.addEventListener("abort", () => removeClient(clientId));

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  // ===========================================================================
  // Dashboard UI
  // ===========================================================================

  routes.get("/", (c) =>
    c.html(
      <Dashboard
        appName={deps.appName}
        targetAddress={deps.targetAddress}
        buttonPins={monitor?.getSnapshot().pins ?? null}
      />,
    ),
  );

  return routes;
}

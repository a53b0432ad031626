/**
 * CEC Remote - Application Entry Point
 *
 * Sets up:
 * - cec-client dispatcher and power control
 * - OLED status display
 * - GPIO push-button monitor
 * - Hono server with SSE, request ID tracing and global error handling
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import {
  type ButtonMonitor,
  createButtonMonitor,
  formatButtonMonitorError,
} from "./buttons/index.js";
import { createCecDispatcher } from "./cec/index.js";
import {
  config,
  getButtonConfig,
  getCecConfig,
  getDisplayConfig,
  getGpioConfig,
} from "./config.js";
import { createPowerControl } from "./control/index.js";
import { createDisabledDisplay, createDisplayService } from "./display/index.js";
import { createPinSource } from "./gpio/index.js";
import { createLogger } from "./logger.js";
import { getLocalIpAddress, webInterfaceUrl } from "./network.js";
import { disconnectAllClients } from "./sse/index.js";

const log = createLogger("app");

const APP_VERSION = "1.0.0";

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log(`  ${config.APP_NAME.toUpperCase()}`);
console.log("========================================");
console.log("");

const cecConfig = getCecConfig();
const displayConfig = getDisplayConfig();
const buttonConfig = getButtonConfig();
const gpioConfig = getGpioConfig();

log.info(
  {
    port: config.PORT,
    host: config.HOST,
    env: config.NODE_ENV,
    cecClient: cecConfig.clientPath,
    targetAddress: cecConfig.targetAddress,
    cooldownMs: cecConfig.cooldownMs,
  },
  "Configuration loaded",
);

if (buttonConfig) {
  log.info(
    { ...buttonConfig, backend: gpioConfig.backend },
    "Physical buttons: ENABLED",
  );
} else {
  log.info("Physical buttons: DISABLED");
}

if (displayConfig) {
  log.info(
    { driver: displayConfig.driver, bus: displayConfig.i2cBus, width: displayConfig.width, height: displayConfig.height },
    "Display: ENABLED",
  );
} else {
  log.info("Display: DISABLED");
}

console.log("");

// =============================================================================
// WIRING
// =============================================================================

const cec = createCecDispatcher(cecConfig);

const display = displayConfig
  ? createDisplayService({ config: displayConfig, appName: config.APP_NAME })
  : createDisabledDisplay();

const control = createPowerControl({ cec, display });

const monitor: ButtonMonitor | null = buttonConfig
  ? createButtonMonitor({
      pinSource: createPinSource(gpioConfig),
      pins: { ON: buttonConfig.powerOnPin, OFF: buttonConfig.powerOffPin },
      actions: control.buttonActions(
        (button) => monitor?.getSession()?.pressCounts[button] ?? 0,
      ),
    })
  : null;

const app = createApp({
  appName: config.APP_NAME,
  version: APP_VERSION,
  targetAddress: cecConfig.targetAddress,
  cec,
  control,
  display,
  monitor,
});

// =============================================================================
// START
// =============================================================================

async function main(): Promise<void> {
  const url = webInterfaceUrl(getLocalIpAddress(), config.PORT);

  if (displayConfig) {
    const initialized = await display.initialize();
    if (initialized.isOk()) {
      await display.showStatus("Starting...", "Please wait");
      await display.showAddress(url);
    }
  }

  if (monitor) {
    const started = await monitor.start();
    if (started.isErr()) {
      log.warn(
        { error: formatButtonMonitorError(started.error) },
        "Physical buttons unavailable; web interface still works",
      );
    }
  }

  const server = serve(
    { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
    (info) => {
      log.info(
        { port: info.port, address: info.address, url },
        `🚀 ${config.APP_NAME} listening on ${url}`,
      );
    },
  );

  // ===========================================================================
  // GRACEFUL SHUTDOWN
  // ===========================================================================

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, `${signal} received. Shutting down gracefully...`);

    if (monitor?.isRunning()) {
      await monitor.stop();
    }

    await display.clear();
    await display.cleanup();

    disconnectAllClients();

    server.close((error) => {
      if (error) {
        log.error({ error: error.message }, "HTTP server close failed");
      }
      log.info("Shutdown complete");
      process.exit(0);
    });
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log.error(
        { error: error instanceof Error ? error.message : String(error) },
        "Shutdown failed",
      );
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((error: unknown) => {
  log.fatal(
    { error: error instanceof Error ? error.message : String(error) },
    "Startup failed",
  );
  process.exit(1);
});

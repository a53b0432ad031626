/**
 * Display Module - Service Layer
 *
 * Status screens on the OLED. The display is optional: until it has been
 * initialized every call is a no-op, and failures are logged, never thrown.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type DisplayError, formatDisplayError } from "./errors.js";
import { loadFont } from "./font.js";
import { createLogDriver } from "./log.js";
import type { DisplayConfig, DisplayDriver, Font, Screen } from "./schema.js";
import { createSsd1306Driver } from "./ssd1306.js";
import { layoutScreen, renderLayout } from "./transform.js";

const log = createLogger("display");

export type DisplayServiceOptions = Readonly<{
  config: DisplayConfig;
  /** Header line on every screen */
  appName: string;
  driver?: DisplayDriver;
  font?: Font;
}>;

export type DisplayService = Readonly<{
  initialize(): Promise<Result<true, DisplayError>>;
  isReady(): boolean;
  showStatus(title: string, status: string): Promise<void>;
  showPowerOn(): Promise<void>;
  showPowerOff(): Promise<void>;
  showAddress(url: string): Promise<void>;
  clear(): Promise<void>;
  cleanup(): Promise<void>;
  /** Last screen drawn, null when blank */
  getScreen(): Screen | null;
}>;

export function createDisplayDriver(config: DisplayConfig): DisplayDriver {
  switch (config.driver) {
    case "ssd1306":
      return createSsd1306Driver(config);
    case "log":
      return createLogDriver();
  }
}

export function createDisplayService(options: DisplayServiceOptions): DisplayService {
  const { config, appName } = options;
  const driver = options.driver ?? createDisplayDriver(config);

  let font: Font | null = options.font ?? null;
  let ready = false;
  let screen: Screen | null = null;
  // One transfer on the bus at a time
  let queue: Promise<void> = Promise.resolve();

  function enqueue(task: () => Promise<void>): Promise<void> {
    const run = queue.then(task);
    queue = run;
    return run;
  }

  function report(result: Result<true, DisplayError>, message: string): void {
    if (result.isErr()) {
      log.error({ error: formatDisplayError(result.error) }, message);
    }
  }

  async function initialize(): Promise<Result<true, DisplayError>> {
    if (!font) {
      const loaded = loadFont();
      if (loaded.isErr()) {
        log.error({ error: formatDisplayError(loaded.error) }, "Display font unavailable");
        return err(loaded.error);
      }
      font = loaded.value;
    }

    const initialized = await driver.init();
    if (initialized.isErr()) {
      log.error(
        { driver: driver.name, error: formatDisplayError(initialized.error) },
        "Failed to initialize display",
      );
      return err(initialized.error);
    }

    ready = true;
    log.info({ driver: driver.name, width: config.width, height: config.height }, "Display initialized");
    return ok(true);
  }

  function show(next: Screen): Promise<void> {
    return enqueue(async () => {
      if (!ready || !font) return;

      const layout = layoutScreen(font, config.width, config.height, appName, next);
      const frame = renderLayout(font, config.width, config.height, layout);
      const lines = layout.items.map((item) => item.text);

      const result = await driver.render(frame, lines);
      report(result, "Display update failed");
      if (result.isOk()) {
        screen = next;
      }
    });
  }

  function clear(): Promise<void> {
    return enqueue(async () => {
      if (!ready) return;
      const result = await driver.clear();
      report(result, "Display clear failed");
      screen = null;
    });
  }

  function cleanup(): Promise<void> {
    return enqueue(async () => {
      if (!ready) return;
      ready = false;
      screen = null;
      await driver.dispose();
      log.info("Display resources released");
    });
  }

  return {
    initialize,
    isReady: () => ready,
    showStatus: (title, status) => show({ title, status }),
    showPowerOn: () => show({ title: "Command sent:", status: "POWER ON" }),
    showPowerOff: () => show({ title: "Command sent:", status: "POWER OFF" }),
    showAddress: (url) => show({ title: "Web Interface:", status: url }),
    clear,
    cleanup,
    getScreen: () => screen,
  };
}

/**
 * Stand-in used when the display is disabled.
 */
export function createDisabledDisplay(): DisplayService {
  const noop = async (): Promise<void> => {};
  return {
    initialize: async () => ok(true),
    isReady: () => false,
    showStatus: noop,
    showPowerOn: noop,
    showPowerOff: noop,
    showAddress: noop,
    clear: noop,
    cleanup: noop,
    getScreen: () => null,
  };
}

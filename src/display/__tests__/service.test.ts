/**
 * Display Service Tests
 *
 * Uses a recording driver in place of the panel.
 */
import { type Result, err, ok } from "neverthrow";
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { DisplayError } from "../errors.js";
import type { DisplayConfig, DisplayDriver, FrameBuffer } from "../schema.js";
import { createDisabledDisplay, createDisplayService } from "../service.js";

const CONFIG: DisplayConfig = {
  driver: "log",
  i2cBus: 1,
  i2cAddress: 0x3c,
  width: 128,
  height: 64,
};

const WRITE_ERROR: DisplayError = {
  type: "WRITE_FAILED",
  address: 0x3c,
  message: "Remote I/O error",
};

type RecordingDriver = DisplayDriver & {
  rendered: Array<ReadonlyArray<string>>;
  frames: FrameBuffer[];
  clears: number;
  disposed: boolean;
  initResult: Result<true, DisplayError>;
  renderResult: Result<true, DisplayError>;
  renderGate: Promise<void> | null;
};

function createRecordingDriver(): RecordingDriver {
  const driver: RecordingDriver = {
    name: "log",
    rendered: [],
    frames: [],
    clears: 0,
    disposed: false,
    initResult: ok(true),
    renderResult: ok(true),
    renderGate: null,
    init: async () => driver.initResult,
    render: async (frame, lines) => {
      if (driver.renderGate) await driver.renderGate;
      driver.frames.push(frame);
      driver.rendered.push(lines);
      return driver.renderResult;
    },
    clear: async () => {
      driver.clears += 1;
      return ok(true);
    },
    dispose: async () => {
      driver.disposed = true;
    },
  };
  return driver;
}

describe("Display Service", () => {
  let driver: RecordingDriver;

  const createService = () =>
    createDisplayService({ config: CONFIG, appName: "CEC Remote", driver });

  beforeEach(() => {
    driver = createRecordingDriver();
  });

  test("ignores updates before initialization", async () => {
    const display = createService();

    await display.showPowerOn();

    expect(display.isReady()).toBe(false);
    expect(driver.rendered).toEqual([]);
    expect(display.getScreen()).toBeNull();
  });

  test("draws the power on screen", async () => {
    const display = createService();
    (await display.initialize())._unsafeUnwrap();

    await display.showPowerOn();

    expect(driver.rendered).toEqual([["CEC Remote", "Command sent:", "POWER ON"]]);
    expect(display.getScreen()).toEqual({ title: "Command sent:", status: "POWER ON" });
    expect(driver.frames[0]?.data).toHaveLength(1024);
  });

  test("draws the power off and address screens", async () => {
    const display = createService();
    await display.initialize();

    await display.showPowerOff();
    await display.showAddress("http://10.0.0.5:5000");

    expect(driver.rendered).toEqual([
      ["CEC Remote", "Command sent:", "POWER OFF"],
      ["CEC Remote", "Web Interface:", "http://10.0.0.5:5000"],
    ]);
  });

  test("stays disabled when the driver fails to initialize", async () => {
    driver.initResult = err({ type: "BUS_OPEN_FAILED", bus: 1, message: "ENOENT" });
    const display = createService();

    const result = await display.initialize();
    await display.showStatus("Starting...", "Please wait");

    expect(result._unsafeUnwrapErr().type).toBe("BUS_OPEN_FAILED");
    expect(display.isReady()).toBe(false);
    expect(driver.rendered).toEqual([]);
  });

  test("logs a failed update and keeps the previous screen", async () => {
    const display = createService();
    await display.initialize();
    await display.showPowerOn();

    driver.renderResult = err(WRITE_ERROR);
    await expect(display.showPowerOff()).resolves.toBeUndefined();

    expect(display.getScreen()).toEqual({ title: "Command sent:", status: "POWER ON" });
  });

  test("serializes updates", async () => {
    const display = createService();
    await display.initialize();

    let release: (value: void) => void = () => {};
    driver.renderGate = new Promise((resolve) => {
      release = resolve;
    });

    const first = display.showPowerOn();
    const second = display.showPowerOff();
    await new Promise((resolve) => setImmediate(resolve));
    expect(driver.rendered).toEqual([]);

    release();
    await Promise.all([first, second]);

    expect(driver.rendered.map((lines) => lines[2])).toEqual(["POWER ON", "POWER OFF"]);
  });

  test("clear blanks the panel", async () => {
    const display = createService();
    await display.initialize();
    await display.showPowerOn();

    await display.clear();

    expect(driver.clears).toBe(1);
    expect(display.getScreen()).toBeNull();
  });

  test("cleanup releases the driver and disables updates", async () => {
    const display = createService();
    await display.initialize();

    await display.cleanup();
    await display.showPowerOn();

    expect(driver.disposed).toBe(true);
    expect(display.isReady()).toBe(false);
    expect(driver.rendered).toEqual([]);
  });

  test("disabled display accepts every call", async () => {
    const display = createDisabledDisplay();

    await display.showPowerOn();
    await display.cleanup();

    expect(display.isReady()).toBe(false);
    expect(display.getScreen()).toBeNull();
  });
});

/**
 * SSD1306 OLED driver over I2C.
 *
 * The panel is page addressed: 8 rows per byte, one page per 8 rows. Every
 * transfer starts with a control byte, 0x00 for commands and 0x40 for data.
 */
import type { PromisifiedBus } from "i2c-bus";
import i2c from "i2c-bus";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { type DisplayError, busOpenFailed, formatDisplayError, writeFailed } from "./errors.js";
import type { DisplayConfig, DisplayDriver, FrameBuffer } from "./schema.js";
import { chunkFrame, createFrame } from "./transform.js";

const log = createLogger("display");

const CONTROL_COMMAND = 0x00;
const CONTROL_DATA = 0x40;
const DATA_CHUNK_SIZE = 16;

export type I2cBus = Pick<PromisifiedBus, "i2cWrite" | "close">;

export type Ssd1306Options = Readonly<{
  openBus?: (busNumber: number) => Promise<I2cBus>;
}>;

export function initSequence(width: number, height: 32 | 64): number[] {
  return [
    0xae, // display off
    0xd5, 0x80, // clock divide
    0xa8, height - 1, // multiplex
    0xd3, 0x00, // display offset
    0x40, // start line 0
    0x8d, 0x14, // charge pump on
    0x20, 0x00, // horizontal addressing
    0xa1, // segment remap
    0xc8, // COM scan descending
    0xda, height === 64 ? 0x12 : 0x02, // COM pins
    0x81, 0xcf, // contrast
    0xd9, 0xf1, // pre-charge
    0xdb, 0x40, // VCOMH
    0xa4, // resume from RAM
    0xa6, // normal, not inverted
    0x21, 0x00, width - 1, // columns
    0x22, 0x00, height / 8 - 1, // pages
    0xaf, // display on
  ];
}

export function createSsd1306Driver(
  config: DisplayConfig,
  options: Ssd1306Options = {},
): DisplayDriver {
  const openBus = options.openBus ?? ((busNumber: number) => i2c.openPromisified(busNumber));
  const address = config.i2cAddress;
  let bus: I2cBus | null = null;

  async function write(control: number, bytes: ArrayLike<number>): Promise<void> {
    if (!bus) return;
    const buffer = Buffer.from([control, ...Array.from(bytes)]);
    await bus.i2cWrite(address, buffer.length, buffer);
  }

  async function commands(bytes: number[]): Promise<Result<true, DisplayError>> {
    try {
      await write(CONTROL_COMMAND, bytes);
      return ok(true);
    } catch (error) {
      return err(writeFailed(address, error));
    }
  }

  async function pushFrame(frame: FrameBuffer): Promise<Result<true, DisplayError>> {
    const addressed = await commands([
      0x21, 0x00, config.width - 1,
      0x22, 0x00, config.height / 8 - 1,
    ]);
    if (addressed.isErr()) return addressed;

    try {
      for (const chunk of chunkFrame(frame, DATA_CHUNK_SIZE)) {
        await write(CONTROL_DATA, chunk);
      }
      return ok(true);
    } catch (error) {
      return err(writeFailed(address, error));
    }
  }

  return {
    name: "ssd1306",

    init: async () => {
      try {
        bus = await openBus(config.i2cBus);
      } catch (error) {
        return err(busOpenFailed(config.i2cBus, error));
      }
      log.info(
        { bus: config.i2cBus, address: `0x${address.toString(16)}`, width: config.width, height: config.height },
        "SSD1306 bus opened",
      );

      const initialized = await commands(initSequence(config.width, config.height));
      if (initialized.isErr()) return initialized;
      return pushFrame(createFrame(config.width, config.height));
    },

    render: (frame) => pushFrame(frame),

    clear: () => pushFrame(createFrame(config.width, config.height)),

    dispose: async () => {
      if (!bus) return;
      const off = await commands([0xae]);
      if (off.isErr()) {
        log.warn({ error: formatDisplayError(off.error) }, "Display power off failed");
      }
      try {
        await bus.close();
      } catch (error) {
        log.warn({ error: error instanceof Error ? error.message : String(error) }, "I2C bus close failed");
      }
      bus = null;
    },
  };
}

/**
 * Display Module - Schemas and Types
 *
 * Status screens for the small monochrome OLED panel.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { DisplayError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export const DisplayConfigSchema = z.object({
  driver: z.enum(["ssd1306", "log"]),
  i2cBus: z.number().int().nonnegative(),
  i2cAddress: z.number().int().min(0x03).max(0x77),
  width: z.number().int().positive(),
  height: z.union([z.literal(32), z.literal(64)]),
});

export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;

// =============================================================================
// Font
// =============================================================================

/**
 * Column-major bitmap font: each glyph is one byte per column, bit 0 at the top.
 */
export const FontSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().min(1).max(8),
    firstCode: z.number().int().nonnegative(),
    glyphs: z.array(z.array(z.number().int().min(0).max(255))).min(1),
  })
  .refine((font) => font.glyphs.every((g) => g.length === font.width), {
    message: "Every glyph must have one byte per column",
  });

export type Font = z.infer<typeof FontSchema>;

// =============================================================================
// Frame Buffer and Layout
// =============================================================================

/**
 * 1 bit per pixel in SSD1306 page order: byte `x + (y >> 3) * width`,
 * bit `y & 7`.
 */
export type FrameBuffer = Readonly<{
  width: number;
  height: number;
  data: Uint8Array;
}>;

export type Screen = Readonly<{
  title: string;
  status: string;
}>;

export type TextItem = Readonly<{
  text: string;
  x: number;
  y: number;
  scale: 1 | 2;
}>;

export type ScreenLayout = Readonly<{
  items: ReadonlyArray<TextItem>;
  ruleY: number;
}>;

// =============================================================================
// Driver
// =============================================================================

/**
 * What the service needs from a panel. `lines` are the texts drawn into
 * `frame`, for drivers without pixels.
 */
export interface DisplayDriver {
  readonly name: DisplayConfig["driver"];
  init(): Promise<Result<true, DisplayError>>;
  render(frame: FrameBuffer, lines: ReadonlyArray<string>): Promise<Result<true, DisplayError>>;
  clear(): Promise<Result<true, DisplayError>>;
  dispose(): Promise<void>;
}

/**
 * Display Module - Pure Transformations
 *
 * Frame buffer drawing and screen layout. No I/O.
 */
import type { Font, FrameBuffer, Screen, ScreenLayout, TextItem } from "./schema.js";

// =============================================================================
// Frame Buffer
// =============================================================================

export function createFrame(width: number, height: number): FrameBuffer {
  return { width, height, data: new Uint8Array((width * height) / 8) };
}

export function setPixel(frame: FrameBuffer, x: number, y: number): void {
  if (x < 0 || y < 0 || x >= frame.width || y >= frame.height) return;
  const index = x + (y >> 3) * frame.width;
  frame.data[index] = (frame.data[index] ?? 0) | (1 << (y & 7));
}

export function getPixel(frame: FrameBuffer, x: number, y: number): boolean {
  if (x < 0 || y < 0 || x >= frame.width || y >= frame.height) return false;
  const byte = frame.data[x + (y >> 3) * frame.width] ?? 0;
  return (byte & (1 << (y & 7))) !== 0;
}

export function drawHLine(frame: FrameBuffer, y: number): void {
  for (let x = 0; x < frame.width; x++) {
    setPixel(frame, x, y);
  }
}

// =============================================================================
// Text
// =============================================================================

/**
 * Glyph columns for a character; unknown characters render as "?".
 */
export function glyphFor(font: Font, char: string): ReadonlyArray<number> {
  const glyph = font.glyphs[char.charCodeAt(0) - font.firstCode];
  if (glyph) return glyph;
  return font.glyphs["?".charCodeAt(0) - font.firstCode] ?? [];
}

/** Horizontal distance between the starts of two glyphs */
const advance = (font: Font, scale: number): number => (font.width + 1) * scale;

export function textWidth(font: Font, text: string, scale: number): number {
  const length = [...text].length;
  return length === 0 ? 0 : length * advance(font, scale) - scale;
}

export function drawText(frame: FrameBuffer, font: Font, item: TextItem): void {
  const { x, y, scale } = item;
  let cursor = x;

  for (const char of item.text) {
    const glyph = glyphFor(font, char);

    for (let column = 0; column < font.width; column++) {
      const bits = glyph[column] ?? 0;
      for (let row = 0; row < font.height; row++) {
        if (((bits >> row) & 1) === 0) continue;
        for (let dx = 0; dx < scale; dx++) {
          for (let dy = 0; dy < scale; dy++) {
            setPixel(frame, cursor + column * scale + dx, y + row * scale + dy);
          }
        }
      }
    }

    cursor += advance(font, scale);
  }
}

/**
 * Largest scale (up to `preferred`) at which the text fits; text too wide
 * even at scale 1 is cut.
 */
export function fitText(
  font: Font,
  text: string,
  maxWidth: number,
  preferred: 1 | 2,
): { text: string; scale: 1 | 2 } {
  if (preferred === 2 && textWidth(font, text, 2) <= maxWidth) {
    return { text, scale: 2 };
  }
  if (textWidth(font, text, 1) <= maxWidth) {
    return { text, scale: 1 };
  }
  const maxChars = Math.floor((maxWidth + 1) / advance(font, 1));
  return { text: [...text].slice(0, maxChars).join(""), scale: 1 };
}

// =============================================================================
// Screens
// =============================================================================

/**
 * Header, rule, title and status. Tall panels use the large font for the
 * header and status; 32-pixel panels use the small font throughout.
 */
export function layoutScreen(
  font: Font,
  width: number,
  height: 32 | 64,
  header: string,
  screen: Screen,
): ScreenLayout {
  const large = height === 64 ? 2 : 1;
  const rows = height === 64
    ? { header: 0, rule: 18, title: 22, status: 36 }
    : { header: 0, rule: 9, title: 12, status: 22 };

  const place = (text: string, y: number, preferred: 1 | 2): TextItem => ({
    ...fitText(font, text, width, preferred),
    x: 0,
    y,
  });

  return {
    items: [
      place(header, rows.header, large),
      place(screen.title, rows.title, 1),
      place(screen.status, rows.status, large),
    ],
    ruleY: rows.rule,
  };
}

export function renderLayout(
  font: Font,
  width: number,
  height: number,
  layout: ScreenLayout,
): FrameBuffer {
  const frame = createFrame(width, height);
  for (const item of layout.items) {
    drawText(frame, font, item);
  }
  drawHLine(frame, layout.ruleY);
  return frame;
}

/**
 * SSD1306 data stream in chunks small enough for one I2C block write.
 */
export function chunkFrame(frame: FrameBuffer, chunkSize: number): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < frame.data.length; offset += chunkSize) {
    chunks.push(frame.data.subarray(offset, offset + chunkSize));
  }
  return chunks;
}

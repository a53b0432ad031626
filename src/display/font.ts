/**
 * Loads the bitmap font from assets/.
 */
import { readFileSync } from "node:fs";
import { type Result, err, ok } from "neverthrow";

import { type DisplayError, fontLoadFailed } from "./errors.js";
import { type Font, FontSchema } from "./schema.js";

export const DEFAULT_FONT_URL = new URL("../../assets/font5x7.json", import.meta.url);

export function loadFont(source: URL = DEFAULT_FONT_URL): Result<Font, DisplayError> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(fontLoadFailed(message, error));
  }

  const parsed = FontSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      fontLoadFailed(parsed.error.issues.map((i) => i.message).join(", ")),
    );
  }
  return ok(parsed.data);
}

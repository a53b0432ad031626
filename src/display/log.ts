/**
 * Display driver for machines without a panel: screens go to the logger.
 */
import { ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { DisplayDriver } from "./schema.js";

const log = createLogger("display");

export function createLogDriver(): DisplayDriver {
  return {
    name: "log",
    init: async () => {
      log.info("Log display driver ready");
      return ok(true);
    },
    render: async (_frame, lines) => {
      log.info({ lines }, `[screen] ${lines.join(" | ")}`);
      return ok(true);
    },
    clear: async () => {
      log.info("[screen] cleared");
      return ok(true);
    },
    dispose: async () => {},
  };
}

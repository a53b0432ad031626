/**
 * Control Module - Service Layer
 *
 * One path for every power command, whether it came from the web UI or a
 * push button: dispatch, then mirror the result on the display and to
 * connected browsers.
 */
import type { Result } from "neverthrow";

import type { ButtonActions, ButtonId } from "../buttons/index.js";
import {
  type CecDispatcher,
  type CecError,
  type PowerAction,
  formatCecError,
} from "../cec/index.js";
import type { DisplayService } from "../display/index.js";
import { createLogger } from "../logger.js";
import { broadcastButtonPress, broadcastPowerCommand } from "../sse/index.js";
import type { CommandSource, PowerCommandOutcome } from "./schema.js";

const log = createLogger("control");

export type PowerEvents = Readonly<{
  powerCommand: typeof broadcastPowerCommand;
  buttonPress: typeof broadcastButtonPress;
}>;

export type PowerControlOptions = Readonly<{
  cec: Pick<CecDispatcher, "powerOn" | "powerOff">;
  display: Pick<DisplayService, "showPowerOn" | "showPowerOff">;
  events?: PowerEvents;
}>;

export type PowerControl = Readonly<{
  powerOn(source: CommandSource): Promise<Result<string, CecError>>;
  powerOff(source: CommandSource): Promise<Result<string, CecError>>;
  /**
   * Button Monitor callbacks. `pressCount` reads the monitor's counter,
   * which already includes the press being handled.
   */
  buttonActions(pressCount: (button: ButtonId) => number): ButtonActions;
  /** Outcome of the most recent power command, null before the first */
  getLastOutcome(): PowerCommandOutcome | null;
}>;

const successMessage = (action: PowerAction): string =>
  `Power ${action} command sent`;

export function createPowerControl(options: PowerControlOptions): PowerControl {
  const { cec, display } = options;
  const events = options.events ?? {
    powerCommand: broadcastPowerCommand,
    buttonPress: broadcastButtonPress,
  };

  let lastOutcome: PowerCommandOutcome | null = null;

  async function send(
    action: PowerAction,
    source: CommandSource,
  ): Promise<Result<string, CecError>> {
    log.info({ action, source }, `Power ${action} requested`);

    const result = action === "ON" ? await cec.powerOn() : await cec.powerOff();

    if (result.isOk()) {
      if (action === "ON") {
        await display.showPowerOn();
      } else {
        await display.showPowerOff();
      }
      lastOutcome = { action, source, success: true, message: successMessage(action) };
    } else {
      const message = formatCecError(result.error);
      if (result.error.type === "RATE_LIMITED") {
        log.warn({ action, source }, message);
      } else {
        log.error({ action, source, errorType: result.error.type }, message);
      }
      lastOutcome = { action, source, success: false, message };
    }

    events.powerCommand(action, source, lastOutcome.success, lastOutcome.message);
    return result;
  }

  async function onButton(button: ButtonId, pressCount: number): Promise<void> {
    events.buttonPress(button, pressCount);
    await send(button, "button");
  }

  return {
    powerOn: (source) => send("ON", source),
    powerOff: (source) => send("OFF", source),
    buttonActions: (pressCount) => ({
      ON: () => onButton("ON", pressCount("ON")),
      OFF: () => onButton("OFF", pressCount("OFF")),
    }),
    getLastOutcome: () => lastOutcome,
  };
}

/**
 * CEC Transform Tests
 */
import { describe, expect, test } from "vitest";

import { INITIAL_CEC_STATE } from "../schema.js";
import {
  extractPowerStatus,
  parsePowerStatus,
  parseScanOutput,
  powerOnCommand,
  powerStatusCommand,
  recordCommand,
  remainingCooldownMs,
  standbyCommand,
  validateCommand,
} from "../transform.js";

describe("command builders", () => {
  test("address the configured device", () => {
    expect(powerOnCommand("0")).toBe("on 0");
    expect(standbyCommand("0")).toBe("standby 0");
    expect(powerStatusCommand("4")).toBe("pow 4");
  });
});

describe("validateCommand", () => {
  test("trims a valid command", () => {
    const result = validateCommand("  tx 10:36 ");
    expect(result._unsafeUnwrap()).toBe("tx 10:36");
  });

  test("rejects an empty command", () => {
    const result = validateCommand("   ");
    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_COMMAND",
      message: "Command is required, Command contains unsupported characters",
    });
  });

  test("rejects shell metacharacters", () => {
    const result = validateCommand("on 0; reboot");
    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_COMMAND",
      message: "Command contains unsupported characters",
    });
  });

  test("rejects overlong commands", () => {
    const result = validateCommand("a".repeat(65));
    expect(result._unsafeUnwrapErr().message).toBe("Command too long");
  });

  test("reports a missing command as required", () => {
    const result = validateCommand(undefined);
    expect(result._unsafeUnwrapErr()).toEqual({
      type: "INVALID_COMMAND",
      message: "Command is required",
    });
  });

  test("rejects non-strings", () => {
    const result = validateCommand(42);
    expect(result._unsafeUnwrapErr().message).toBe("Command must be a string");
  });
});

describe("cooldown", () => {
  test("nothing to wait for before the first command", () => {
    expect(remainingCooldownMs(null, 1000, 2000)).toBe(0);
  });

  test("counts down from the last command", () => {
    expect(remainingCooldownMs(1000, 1500, 2000)).toBe(1500);
    expect(remainingCooldownMs(1000, 3000, 2000)).toBe(0);
    expect(remainingCooldownMs(1000, 9000, 2000)).toBe(0);
  });

  test("recordCommand stores time and command", () => {
    expect(recordCommand(INITIAL_CEC_STATE, "on 0", 42)).toEqual({
      lastCommandTime: 42,
      lastCommand: "on 0",
    });
  });
});

describe("power status parsing", () => {
  test("maps known values", () => {
    expect(parsePowerStatus("on")).toBe("ON");
    expect(parsePowerStatus(" Standby ")).toBe("STANDBY");
    expect(parsePowerStatus("in transition from standby to on")).toBe("TRANSITIONING");
    expect(parsePowerStatus("unknown")).toBe("UNKNOWN");
  });

  test("finds the status line in pow output", () => {
    const output = "opening a connection to the CEC adapter...\npower status: standby\n";
    expect(extractPowerStatus(output)).toBe("STANDBY");
  });

  test("is UNKNOWN without a status line", () => {
    expect(extractPowerStatus("opening a connection to the CEC adapter...\n")).toBe("UNKNOWN");
  });
});

describe("parseScanOutput", () => {
  const output = [
    "opening a connection to the CEC adapter...",
    "requesting CEC bus information ...",
    "CEC bus information",
    "===================",
    "device #0: TV",
    "address:       0.0.0.0",
    "active source: no",
    "vendor:        Samsung",
    "osd string:    TV",
    "CEC version:   1.4",
    "power status:  on",
    "language:      eng",
    "",
    "",
    "device #1: Recorder 1",
    "address:       1.0.0.0",
    "active source: yes",
    "vendor:        Pulse Eight",
    "osd string:    CECTester",
    "CEC version:   1.4",
    "power status:  on",
    "language:      eng",
    "",
    "",
    "currently active source: Recorder 1 (1)",
  ].join("\n");

  test("reads one entry per device block", () => {
    const devices = parseScanOutput(output);

    expect(devices).toEqual([
      {
        logicalAddress: 0,
        name: "TV",
        physicalAddress: "0.0.0.0",
        activeSource: false,
        vendor: "Samsung",
        osdName: "TV",
        cecVersion: "1.4",
        powerStatus: "ON",
      },
      {
        logicalAddress: 1,
        name: "Recorder 1",
        physicalAddress: "1.0.0.0",
        activeSource: true,
        vendor: "Pulse Eight",
        osdName: "CECTester",
        cecVersion: "1.4",
        powerStatus: "ON",
      },
    ]);
  });

  test("ignores lines before the first device", () => {
    expect(parseScanOutput("vendor: Samsung\n")).toEqual([]);
  });

  test("leaves missing fields null", () => {
    const devices = parseScanOutput("device #4: Playback 1\n");
    expect(devices[0]).toEqual({
      logicalAddress: 4,
      name: "Playback 1",
      physicalAddress: null,
      activeSource: null,
      vendor: null,
      osdName: null,
      cecVersion: null,
      powerStatus: "UNKNOWN",
    });
  });
});

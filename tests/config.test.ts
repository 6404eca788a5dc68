import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { loadConfig, loadDotenv } from "../src/config.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      ADB_PATH: "adb",
      SHELL_MODE: "adb",
      VIRTUAL_DISPLAY: true,
      VD_NAME: "ZiZipVirtual",
      VD_FALLBACK_ID: 2,
      VD_DPI: 320,
      INPUT_METHOD: "broadcast",
      MAX_STEPS: 30,
      MAX_FAILURES: 3,
      STEP_DELAY: 2,
      LOG_LEVEL: "info",
      LOG_FILE: "",
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      SHELL_MODE: "local",
      VIRTUAL_DISPLAY: "false",
      VD_FALLBACK_ID: "4",
      VD_NAME: "LabVirtual",
      STEP_DELAY: "0.5",
      MAX_RETRIES: "5",
      MAX_FAILURES: "1",
      LOG_LEVEL: "debug",
    });

    expect(config).toMatchObject({
      SHELL_MODE: "local",
      VIRTUAL_DISPLAY: false,
      VD_FALLBACK_ID: 4,
      VD_NAME: "LabVirtual",
      STEP_DELAY: 0.5,
      MAX_RETRIES: 5,
      MAX_FAILURES: 1,
      LOG_LEVEL: "debug",
    });
  });

  it("lists every invalid value in one error", () => {
    expect(() =>
      loadConfig({ VD_WIDTH: "wide", SHELL_MODE: "ssh", VD_NAME: "my display" })
    ).toThrow(
      [
        "Invalid configuration:",
        `- VD_NAME may only contain letters, digits, '_', '.' and '-' (got "my display")`,
        `- SHELL_MODE must be one of adb, local (got "ssh")`,
        `- VD_WIDTH must be an integer >= 1 (got "wide")`,
      ].join("\n")
    );
  });
});

describe("loadDotenv", () => {
  const key = "SIDESCREEN_TEST_VALUE";

  afterEach(() => {
    delete process.env[key];
  });

  it("loads .env from the given directory", () => {
    const dir = mkdtempSync(join(tmpdir(), "sidescreen-env-"));
    writeFileSync(join(dir, ".env"), `${key}=from-file\n`);

    expect(loadDotenv(dir)).toBe(join(dir, ".env"));
    expect(process.env[key]).toBe("from-file");
  });

  it("returns null when there is no .env", () => {
    expect(loadDotenv(mkdtempSync(join(tmpdir(), "sidescreen-env-")))).toBeNull();
  });
});

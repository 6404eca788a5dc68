import { describe, expect, it } from "vitest";

import { BroadcastInputMethod, ShellTextInput } from "../src/display/input-method.js";
import { parseForegroundApp, parseScreenSize, ScreenController } from "../src/display/screen.js";
import { MemoryLogger } from "../src/logger.js";
import { deviceChannel } from "./helpers.js";

function createScreen(channel = deviceChannel(), logger = new MemoryLogger()) {
  return { channel, logger, screen: new ScreenController(channel, logger, new BroadcastInputMethod(channel, logger)) };
}

describe("ScreenController", () => {
  it("issues primary-display input without a display flag", async () => {
    const { channel, screen } = createScreen();

    expect(await screen.tap(10, 20)).toBe(true);
    expect(await screen.swipe(1, 2, 3, 4, 500)).toBe(true);
    expect(await screen.pressHome()).toBe(true);

    expect(channel.commands).toEqual([
      "input tap 10 20",
      "input swipe 1 2 3 4 500",
      "input keyevent 3",
    ]);
  });

  it("reports a failed command as false", async () => {
    const { channel, screen } = createScreen();
    channel.on(/^input tap/, { success: false, error: "injection denied" });

    expect(await screen.tap(1, 1)).toBe(false);
  });

  it("captures the primary display without a display id", async () => {
    const { channel, screen } = createScreen();

    const shot = await screen.captureScreenshot();
    expect(shot).not.toBeNull();
    expect(shot?.displayId).toBeUndefined();
    expect(shot?.path).toMatch(/^\/sdcard\/Download\/screenshot_\d+\.png$/);
    expect(channel.commands[0]).toBe(`screencap -p ${shot?.path}`);
    expect(channel.commands[1]).toBe(`stat -c %s ${shot?.path}`);
  });

  it("returns null when screencap fails", async () => {
    const { channel, screen, logger } = createScreen();
    channel.on(/^screencap/, { success: false, error: "no display" });

    expect(await screen.captureScreenshot()).toBeNull();
    expect(logger.getEntries("error").map((e) => e.message)).toEqual(["Screenshot failed: no display"]);
  });

  it("sends text through the input method", async () => {
    const { channel, screen } = createScreen();

    expect(await screen.inputText("hi")).toBe(true);
    expect(channel.commands).toEqual(["am broadcast -a ADB_INPUT_B64 --es msg aGk="]);
  });

  it("refuses empty text", async () => {
    const { channel, screen } = createScreen();

    expect(await screen.inputText("")).toBe(false);
    expect(channel.commands).toEqual([]);
  });

  it("passes the display id to a shell input method", async () => {
    const channel = deviceChannel();
    const logger = new MemoryLogger();
    const screen = new ScreenController(channel, logger, new ShellTextInput(channel, logger));

    expect(await screen.inputText("a b", 7)).toBe(true);
    expect(channel.commands).toEqual(["input -d 7 text a%sb"]);
  });

  it("never sends multi-line text to the shell", async () => {
    const channel = deviceChannel();
    const logger = new MemoryLogger();
    const screen = new ScreenController(channel, logger, new ShellTextInput(channel, logger));

    expect(await screen.inputText("hi\nreboot")).toBe(false);
    expect(channel.commands).toEqual([]);
    expect(logger.getEntries("error").map((e) => e.message)).toEqual(["Rejected input-text command"]);
  });

  it("reads the screen size", async () => {
    const { channel, screen } = createScreen();
    channel.on(/^wm size/, { success: true, output: "Physical size: 1080x2400\nOverride size: 720x1600" });

    expect(await screen.getScreenSize()).toEqual([720, 1600]);
  });

  it("reads the foreground app", async () => {
    const { channel, screen } = createScreen();
    channel.on(/^dumpsys activity/, {
      success: true,
      output: "  mResumedActivity: ActivityRecord{5c1e u0 com.android.settings/.Settings t12}",
    });

    expect(await screen.getForegroundApp()).toEqual({
      packageName: "com.android.settings",
      activity: "com.android.settings.Settings",
    });
  });
});

describe("parsers", () => {
  it("falls back to the physical size", () => {
    expect(parseScreenSize("Physical size: 1080x2400")).toEqual([1080, 2400]);
    expect(parseScreenSize("garbage")).toBeNull();
  });

  it("keeps fully qualified activity names", () => {
    expect(parseForegroundApp("topResumedActivity=ActivityRecord{1 u0 com.example.app/com.example.app.Main t3}")).toEqual({
      packageName: "com.example.app",
      activity: "com.example.app.Main",
    });
    expect(parseForegroundApp("nothing resumed")).toBeNull();
  });
});

import { describe, expect, it } from "vitest";

import { VirtualDisplayManager } from "../src/display/virtual-display.js";
import { MemoryLogger } from "../src/logger.js";
import { deviceChannel, FakeChannel } from "./helpers.js";

function createManager(channel: FakeChannel, logger = new MemoryLogger()) {
  return new VirtualDisplayManager(channel, logger, {
    name: "LabVirtual",
    readyDelayMs: 0,
    resolveBackoffMs: 0,
  });
}

function listing(output: string) {
  return { success: true, output };
}

describe("VirtualDisplayManager", () => {
  it("creates a display and resolves its id from the listing", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, listing("LabVirtual displayId=7"));
    const manager = createManager(channel);

    expect(await manager.createDisplay(1080, 1920, 320)).toBe(true);
    expect(manager.getDisplayId()).toBe(7);
    expect(manager.state).toBe("active");
    expect(manager.getSession()).toEqual({ displayId: 7, width: 1080, height: 1920, dpi: 320, name: "LabVirtual" });
    expect(channel.commands.slice(0, 2)).toEqual([
      "wm create-display --width 1080 --height 1920 --density 320 LabVirtual",
      "dumpsys display displays",
    ]);
  });

  it("routes input to the resolved display and removes it", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, listing("LabVirtual displayId=7"));
    const manager = createManager(channel);
    await manager.createDisplay(1080, 1920, 320);

    expect(await manager.tap(100, 200)).toBe(true);
    expect(await manager.swipe(540, 1500, 540, 500)).toBe(true);
    expect(await manager.pressBack()).toBe(true);
    await manager.removeDisplay();

    expect(channel.commands.slice(2)).toEqual([
      "input -d 7 tap 100 200",
      "input -d 7 swipe 540 1500 540 500 300",
      "input -d 7 keyevent 4",
      "wm remove-display 7",
    ]);
    expect(manager.getDisplayId()).toBeNull();
    expect(manager.state).toBe("inactive");
  });

  it("assumes the fallback id with a warning when the listing never mentions the display", async () => {
    const logger = new MemoryLogger();
    const channel = deviceChannel().on(/^dumpsys display/, listing("Built-in Screen displayId=0"));
    const manager = createManager(channel, logger);

    expect(await manager.createDisplay(720, 1280, 240)).toBe(true);
    expect(manager.getDisplayId()).toBe(2);
    expect(channel.matching(/^dumpsys display/)).toHaveLength(3);
    const warnings = logger.getEntries("warn").map((e) => e.message);
    expect(warnings).toContain(
      'Display "LabVirtual" not found in listing after 3 attempt(s); assuming fallback id 2'
    );
  });

  it("keeps polling until the display shows up", async () => {
    let calls = 0;
    const channel = deviceChannel().on(/^dumpsys display/, () => {
      calls++;
      return listing(calls < 2 ? "" : "VirtualDisplay mDisplayId=9");
    });
    const manager = createManager(channel);

    expect(await manager.createDisplay(720, 1280, 240)).toBe(true);
    expect(manager.getDisplayId()).toBe(9);
    expect(calls).toBe(2);
  });

  it("fails creation when no listing succeeds", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, { success: false, error: "permission denied" });
    const manager = createManager(channel);

    expect(await manager.createDisplay(720, 1280, 240)).toBe(false);
    expect(manager.isActive).toBe(false);
    expect(manager.state).toBe("inactive");
  });

  it("reports false and stays inactive when the OS rejects the display", async () => {
    const channel = deviceChannel().on(/^wm create-display/, { success: false, error: "Unknown command" });
    const manager = createManager(channel);

    expect(await manager.createDisplay(1080, 1920, 320)).toBe(false);
    expect(manager.getDisplayId()).toBeNull();
    expect(channel.matching(/^dumpsys/)).toEqual([]);
  });

  it("refuses non-positive dimensions without touching the channel", async () => {
    const channel = deviceChannel();
    const manager = createManager(channel);

    expect(await manager.createDisplay(0, 1920, 320)).toBe(false);
    expect(await manager.createDisplay(1080, 1920.5, 320)).toBe(false);
    expect(channel.commands).toEqual([]);
  });

  it("returns false and null for operations while inactive", async () => {
    const logger = new MemoryLogger();
    const channel = deviceChannel();
    const manager = createManager(channel, logger);

    expect(await manager.tap(1, 1)).toBe(false);
    expect(await manager.key(3)).toBe(false);
    expect(await manager.captureScreenshot()).toBeNull();
    expect(channel.commands).toEqual([]);
    expect(logger.getEntries("warn").map((e) => e.message)).toEqual([
      "Virtual display not active, cannot tap",
      "Virtual display not active, cannot key",
      "Virtual display not active, cannot capture",
    ]);
  });

  it("treats removal of an inactive display as a no-op", async () => {
    const channel = deviceChannel();
    const manager = createManager(channel);

    await manager.removeDisplay();
    expect(channel.commands).toEqual([]);
  });

  it("clears the session even when removal fails", async () => {
    const channel = deviceChannel()
      .on(/^dumpsys display/, listing("LabVirtual displayId=7"))
      .on(/^wm remove-display/, { success: false, error: "no such display" });
    const manager = createManager(channel);
    await manager.createDisplay(1080, 1920, 320);

    await manager.removeDisplay();
    expect(manager.isActive).toBe(false);
  });

  it("replaces an active display on a second create", async () => {
    let next = 7;
    const channel = deviceChannel().on(/^dumpsys display/, () => listing(`LabVirtual displayId=${next}`));
    const manager = createManager(channel);
    await manager.createDisplay(1080, 1920, 320);
    next = 8;

    expect(await manager.createDisplay(720, 1280, 240)).toBe(true);
    expect(manager.getDisplayId()).toBe(8);
    expect(channel.commands).toContain("wm remove-display 7");
  });

  it("captures to a fresh path on the virtual display", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, listing("LabVirtual displayId=7"));
    const manager = createManager(channel);
    await manager.createDisplay(1080, 1920, 320);

    const first = await manager.captureScreenshot();
    const second = await manager.captureScreenshot();

    expect(first?.displayId).toBe(7);
    expect(first?.sizeBytes).toBe(48213);
    expect(first?.path).toMatch(/^\/sdcard\/Download\/vd_screenshot_\d+\.png$/);
    expect(second?.path).not.toBe(first?.path);
    expect(channel.matching(/^screencap/)[0]).toBe(`screencap -d 7 -p ${first?.path}`);
  });

  it("returns null when the screenshot file is empty", async () => {
    const channel = deviceChannel()
      .on(/^dumpsys display/, listing("LabVirtual displayId=7"))
      .on(/^stat -c %s /, { success: true, output: "0" });
    const manager = createManager(channel);
    await manager.createDisplay(1080, 1920, 320);

    expect(await manager.captureScreenshot()).toBeNull();
  });

  it("serializes concurrent lifecycle calls", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, listing("LabVirtual displayId=7"));
    const manager = createManager(channel);

    const [created, tapped] = await Promise.all([manager.createDisplay(1080, 1920, 320), manager.tap(5, 6)]);
    expect(created).toBe(true);
    expect(tapped).toBe(true);
    expect(channel.commands.at(-1)).toBe("input -d 7 tap 5 6");
  });
});

describe("VirtualDisplayManager with the default display name", () => {
  const immediate = { readyDelayMs: 0, resolveBackoffMs: 0 };

  it("resolves id 7 from the listing and taps exactly there", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, listing("... ZiZipVirtual displayId=7 ..."));
    const manager = new VirtualDisplayManager(channel, new MemoryLogger(), immediate);

    expect(await manager.createDisplay(1080, 1920, 320)).toBe(true);
    expect(manager.isActive).toBe(true);
    expect(manager.getDisplayId()).toBe(7);
    expect(channel.commands[0]).toBe("wm create-display --width 1080 --height 1920 --density 320 ZiZipVirtual");

    expect(await manager.tap(100, 200)).toBe(true);
    channel.on(/^input -d 7 tap/, { success: false, error: "injection refused" });
    expect(await manager.tap(100, 200)).toBe(false);
    expect(channel.matching(/^input /)).toEqual(["input -d 7 tap 100 200", "input -d 7 tap 100 200"]);
  });

  it("falls back to id 2 when no listing line matches", async () => {
    const channel = deviceChannel().on(/^dumpsys display/, listing("... Built-in Screen displayId=0 ..."));
    const manager = new VirtualDisplayManager(channel, new MemoryLogger(), immediate);

    expect(await manager.createDisplay(1080, 1920, 320)).toBe(true);
    expect(manager.getDisplayId()).toBe(2);
  });
});

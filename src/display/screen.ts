/**
 * Automation of the primary display. Stateless: every call is issued on its
 * own against the default display.
 */

import type { ScreenshotFile } from "@sidescreen/shared";

import {
  DEFAULT_SCREENSHOT_DIR,
  KEYCODE_BACK,
  KEYCODE_HOME,
  SWIPE_DURATION_MS,
} from "../constants.js";
import type { Logger } from "../logger.js";
import type { CommandChannel } from "../shell/channel.js";
import type { ShellCommand } from "../shell/commands.js";
import { executeCommand } from "../shell/exec.js";
import { captureToFile, ScreenshotPaths } from "./capture.js";
import type { TextInputMethod } from "./input-method.js";
import type { InputTarget } from "./input-target.js";

const TAG = "ScreenController";

export interface ForegroundApp {
  packageName: string;
  activity?: string;
}

/**
 * Reads `wm size` output. "Override size" wins over "Physical size".
 */
export function parseScreenSize(output: string): [number, number] | null {
  const override = output.match(/Override size:\s*(\d+)x(\d+)/);
  if (override) {
    return [parseInt(override[1], 10), parseInt(override[2], 10)];
  }
  const physical = output.match(/Physical size:\s*(\d+)x(\d+)/);
  if (physical) {
    return [parseInt(physical[1], 10), parseInt(physical[2], 10)];
  }
  return null;
}

/**
 * Finds the resumed activity in `dumpsys activity activities` output.
 */
export function parseForegroundApp(output: string): ForegroundApp | null {
  const match = output.match(/(?:mResumedActivity|topResumedActivity).*?([A-Za-z][\w.]*)\/([\w.$]+)/);
  if (!match) return null;
  const packageName = match[1];
  const rawActivity = match[2];
  const activity = rawActivity.startsWith(".") ? `${packageName}${rawActivity}` : rawActivity;
  return { packageName, activity };
}

export class ScreenController implements InputTarget {
  private readonly paths: ScreenshotPaths;

  constructor(
    private readonly channel: CommandChannel,
    private readonly logger: Logger,
    private readonly inputMethod: TextInputMethod,
    screenshotDir = DEFAULT_SCREENSHOT_DIR
  ) {
    this.paths = new ScreenshotPaths(screenshotDir, "screenshot");
  }

  captureScreenshot(): Promise<ScreenshotFile | null> {
    return captureToFile(this.channel, this.logger, TAG, this.paths.next());
  }

  async tap(x: number, y: number): Promise<boolean> {
    this.logger.debug(TAG, `TAP (${x}, ${y})`);
    return this.run({ kind: "tap", x, y });
  }

  async swipe(x1: number, y1: number, x2: number, y2: number, durationMs = SWIPE_DURATION_MS): Promise<boolean> {
    this.logger.debug(TAG, `SWIPE (${x1}, ${y1}) -> (${x2}, ${y2})`);
    return this.run({ kind: "swipe", x1, y1, x2, y2, durationMs });
  }

  async key(keyCode: number): Promise<boolean> {
    this.logger.debug(TAG, `KEY ${keyCode}`);
    return this.run({ kind: "keyevent", keyCode });
  }

  pressBack(): Promise<boolean> {
    return this.key(KEYCODE_BACK);
  }

  pressHome(): Promise<boolean> {
    return this.key(KEYCODE_HOME);
  }

  /**
   * Hands `text` to the input method. `displayId` is passed through for
   * input methods that can target a display.
   */
  async inputText(text: string, displayId?: number): Promise<boolean> {
    if (!text) {
      this.logger.warn(TAG, "No text to type");
      return false;
    }
    this.logger.debug(TAG, `TEXT via ${this.inputMethod.name}: "${text}"`);
    try {
      return await this.inputMethod.inputText(text, displayId);
    } catch (err) {
      this.logger.error(TAG, "Input method failed", err);
      return false;
    }
  }

  async getScreenSize(): Promise<[number, number] | null> {
    const result = await executeCommand(this.channel, this.logger, TAG, { kind: "display-size" });
    if (!result.success) {
      this.logger.warn(TAG, "Could not detect screen resolution");
      return null;
    }
    return parseScreenSize(result.output ?? "");
  }

  async getForegroundApp(): Promise<ForegroundApp | null> {
    const result = await executeCommand(this.channel, this.logger, TAG, { kind: "foreground-activity" });
    if (!result.success) return null;
    return parseForegroundApp(result.output ?? "");
  }

  private async run(command: ShellCommand): Promise<boolean> {
    const result = await executeCommand(this.channel, this.logger, TAG, command);
    return result.success;
  }
}

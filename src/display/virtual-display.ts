/**
 * Owns the lifecycle of at most one secondary display.
 *
 *   inactive -> creating -> active -> removing -> inactive
 *
 * A failed creation returns to inactive. Every operation goes through one
 * queue, so lifecycle changes never interleave with input or capture. No
 * method throws; failures come back as false/null and are logged.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { DisplaySession, DisplaySessionState, ScreenshotFile } from "@sidescreen/shared";

import {
  DEFAULT_DISPLAY_DPI,
  DEFAULT_DISPLAY_NAME,
  DEFAULT_FALLBACK_DISPLAY_ID,
  DEFAULT_READY_DELAY_MS,
  DEFAULT_RESOLVE_ATTEMPTS,
  DEFAULT_SCREENSHOT_DIR,
  KEYCODE_BACK,
  KEYCODE_HOME,
  RESOLVE_BACKOFF_MS,
  SWIPE_DURATION_MS,
  VIRTUAL_DISPLAY_MARKER,
} from "../constants.js";
import { describeError, type Logger } from "../logger.js";
import type { CommandChannel } from "../shell/channel.js";
import type { ShellCommand } from "../shell/commands.js";
import { executeCommand } from "../shell/exec.js";
import { captureToFile, ScreenshotPaths } from "./capture.js";
import type { InputTarget } from "./input-target.js";
import { resolveDisplayId, type ResolvedDisplayId } from "./resolver.js";
import { SerialQueue } from "./serial-queue.js";

const TAG = "VirtualDisplayManager";

export interface VirtualDisplayOptions {
  /** Logical label passed to the OS and searched for in the listing. */
  name?: string;
  marker?: string;
  /** Id assumed when the listing never mentions the display. */
  fallbackId?: number;
  screenshotDir?: string;
  /** Pause between a successful create and the first listing. */
  readyDelayMs?: number;
  resolveAttempts?: number;
  /** Delay before the second listing; doubles for each further one. */
  resolveBackoffMs?: number;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export class VirtualDisplayManager implements InputTarget {
  private session: DisplaySession | null = null;
  private currentState: DisplaySessionState = "inactive";
  private readonly queue = new SerialQueue();
  private readonly paths: ScreenshotPaths;

  private readonly name: string;
  private readonly marker: string;
  private readonly fallbackId: number;
  private readonly readyDelayMs: number;
  private readonly resolveAttempts: number;
  private readonly resolveBackoffMs: number;

  constructor(
    private readonly channel: CommandChannel,
    private readonly logger: Logger,
    options: VirtualDisplayOptions = {}
  ) {
    this.name = options.name ?? DEFAULT_DISPLAY_NAME;
    this.marker = options.marker ?? VIRTUAL_DISPLAY_MARKER;
    this.fallbackId = options.fallbackId ?? DEFAULT_FALLBACK_DISPLAY_ID;
    this.readyDelayMs = options.readyDelayMs ?? DEFAULT_READY_DELAY_MS;
    this.resolveAttempts = Math.max(1, options.resolveAttempts ?? DEFAULT_RESOLVE_ATTEMPTS);
    this.resolveBackoffMs = options.resolveBackoffMs ?? RESOLVE_BACKOFF_MS;
    this.paths = new ScreenshotPaths(options.screenshotDir ?? DEFAULT_SCREENSHOT_DIR, "vd_screenshot");
  }

  get state(): DisplaySessionState {
    return this.currentState;
  }

  get isActive(): boolean {
    return this.session !== null;
  }

  getDisplayId(): number | null {
    return this.session?.displayId ?? null;
  }

  getSession(): DisplaySession | null {
    return this.session ? { ...this.session } : null;
  }

  // ===========================================
  // Lifecycle
  // ===========================================

  /**
   * Creates the display, replacing any active one. Returns false when the
   * OS refuses or the new display cannot be located; callers then fall back
   * to the primary display.
   */
  createDisplay(width: number, height: number, dpi = DEFAULT_DISPLAY_DPI): Promise<boolean> {
    return this.queue.run(() => this.create(width, height, dpi));
  }

  /** Tears the display down. A no-op when nothing is active. */
  removeDisplay(): Promise<void> {
    return this.queue.run(() => this.remove());
  }

  private async create(width: number, height: number, dpi: number): Promise<boolean> {
    if (!isPositiveInteger(width) || !isPositiveInteger(height) || !isPositiveInteger(dpi)) {
      this.logger.warn(TAG, `Refusing to create display ${width}x${height} @ ${dpi}dpi: dimensions must be positive integers`);
      return false;
    }

    this.logger.info(TAG, `Creating virtual display ${width}x${height} @ ${dpi}dpi`);
    if (this.session) {
      await this.remove();
    }

    this.currentState = "creating";
    try {
      const created = await this.exec({ kind: "create-display", width, height, density: dpi, name: this.name });
      if (!created.success) {
        this.logger.warn(TAG, `create-display rejected: ${created.error ?? "no error output"}`);
        return false;
      }

      const resolved = await this.locate();
      if (!resolved) {
        this.logger.error(TAG, `Display "${this.name}" was created but its id could not be determined`);
        return false;
      }

      this.session = { displayId: resolved.displayId, width, height, dpi, name: this.name };
      this.currentState = "active";
      this.logger.info(TAG, `Virtual display ready (id ${resolved.displayId}, ${resolved.source})`);
      return true;
    } catch (err) {
      this.logger.error(TAG, `Virtual display creation failed: ${describeError(err)}`);
      return false;
    } finally {
      if (this.currentState !== "active") {
        this.session = null;
        this.currentState = "inactive";
      }
    }
  }

  /**
   * Polls the listing until the display shows up. Returns the fallback id
   * when listings succeed but never mention it, and null when no listing
   * succeeds at all.
   */
  private async locate(): Promise<ResolvedDisplayId | null> {
    if (this.readyDelayMs > 0) {
      await sleep(this.readyDelayMs);
    }

    let fallback: ResolvedDisplayId | null = null;
    for (let attempt = 0; attempt < this.resolveAttempts; attempt++) {
      if (attempt > 0 && this.resolveBackoffMs > 0) {
        await sleep(this.resolveBackoffMs * 2 ** (attempt - 1));
      }

      const listing = await this.exec({ kind: "list-displays" });
      if (!listing.success) {
        this.logger.warn(TAG, `Display listing failed (attempt ${attempt + 1}/${this.resolveAttempts}): ${listing.error ?? "no error output"}`);
        continue;
      }

      const resolved = resolveDisplayId(listing.output ?? "", {
        name: this.name,
        marker: this.marker,
        fallbackId: this.fallbackId,
      });
      if (resolved.source === "listing") {
        return resolved;
      }
      fallback = resolved;
    }

    if (fallback) {
      this.logger.warn(
        TAG,
        `Display "${this.name}" not found in listing after ${this.resolveAttempts} attempt(s); assuming fallback id ${fallback.displayId}`
      );
    }
    return fallback;
  }

  private async remove(): Promise<void> {
    const session = this.session;
    if (!session) {
      this.logger.debug(TAG, "No active virtual display to remove");
      return;
    }

    this.currentState = "removing";
    const result = await this.exec({ kind: "remove-display", displayId: session.displayId });
    if (!result.success) {
      this.logger.warn(TAG, `remove-display ${session.displayId} failed, dropping the handle anyway: ${result.error ?? "no error output"}`);
    }
    this.session = null;
    this.currentState = "inactive";
    this.logger.info(TAG, `Virtual display ${session.displayId} removed`);
  }

  // ===========================================
  // Capture and input
  // ===========================================

  captureScreenshot(): Promise<ScreenshotFile | null> {
    return this.queue.run(async () => {
      const displayId = this.requireDisplay("capture");
      if (displayId === null) return null;
      return captureToFile(this.channel, this.logger, TAG, this.paths.next(), displayId);
    });
  }

  tap(x: number, y: number): Promise<boolean> {
    return this.input("tap", (displayId) => ({ kind: "tap", x, y, displayId }));
  }

  swipe(x1: number, y1: number, x2: number, y2: number, durationMs = SWIPE_DURATION_MS): Promise<boolean> {
    return this.input("swipe", (displayId) => ({ kind: "swipe", x1, y1, x2, y2, durationMs, displayId }));
  }

  key(keyCode: number): Promise<boolean> {
    return this.input("key", (displayId) => ({ kind: "keyevent", keyCode, displayId }));
  }

  pressBack(): Promise<boolean> {
    return this.key(KEYCODE_BACK);
  }

  pressHome(): Promise<boolean> {
    return this.key(KEYCODE_HOME);
  }

  private input(label: string, build: (displayId: number) => ShellCommand): Promise<boolean> {
    return this.queue.run(async () => {
      const displayId = this.requireDisplay(label);
      if (displayId === null) return false;
      const result = await this.exec(build(displayId));
      return result.success;
    });
  }

  private requireDisplay(operation: string): number | null {
    const displayId = this.getDisplayId();
    if (displayId === null) {
      this.logger.warn(TAG, `Virtual display not active, cannot ${operation}`);
    }
    return displayId;
  }

  private exec(command: ShellCommand) {
    return executeCommand(this.channel, this.logger, TAG, command);
  }
}

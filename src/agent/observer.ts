/**
 * Builds the ScreenContext for one decision cycle.
 */

import type { ScreenContext, ScreenshotFile } from "@sidescreen/shared";

import { DEFAULT_MAX_ELEMENTS, DEVICE_DUMP_PATH } from "../constants.js";
import type { ScreenController } from "../display/screen.js";
import type { VirtualDisplayManager } from "../display/virtual-display.js";
import type { Logger } from "../logger.js";
import { filterElements, getInteractiveElements, type CompactUIElement } from "../sanitizer.js";
import type { ArtifactReader } from "../shell/artifacts.js";
import type { CommandChannel } from "../shell/channel.js";
import { executeCommand } from "../shell/exec.js";

const TAG = "ScreenObserver";

export interface Observation {
  context: ScreenContext;
  /** Interactive elements of the primary display; empty on a virtual display. */
  elements: CompactUIElement[];
  screenshot: ScreenshotFile | null;
}

export interface ScreenObserverDeps {
  channel: CommandChannel;
  screen: ScreenController;
  virtualDisplay: VirtualDisplayManager;
  reader: ArtifactReader;
  logger: Logger;
  maxElements?: number;
}

export class ScreenObserver {
  private readonly maxElements: number;

  constructor(private readonly deps: ScreenObserverDeps) {
    this.maxElements = deps.maxElements ?? DEFAULT_MAX_ELEMENTS;
  }

  async observe(): Promise<Observation> {
    const { screen, virtualDisplay, logger } = this.deps;
    const onVirtual = virtualDisplay.isActive;

    const screenshot = onVirtual ? await virtualDisplay.captureScreenshot() : await screen.captureScreenshot();
    const context: ScreenContext = {};

    if (screenshot) {
      const bytes = await this.deps.reader.read(screenshot.path);
      if (bytes) context.screenshotBytes = bytes;
    } else {
      logger.warn(TAG, "No screenshot this cycle");
    }

    let elements: CompactUIElement[] = [];
    if (!onVirtual) {
      const tree = await this.dumpNodeTree();
      if (tree) {
        context.nodeTreeText = tree;
        elements = filterElements(getInteractiveElements(tree, logger), this.maxElements);
      }
    }

    const foreground = await screen.getForegroundApp();
    if (foreground) {
      context.foregroundPackage = foreground.packageName;
      if (foreground.activity) context.foregroundActivity = foreground.activity;
    }

    logger.debug(
      TAG,
      `Observed ${onVirtual ? "virtual" : "primary"} display: ${elements.length} element(s), foreground ${context.foregroundPackage ?? "unknown"}`
    );
    return { context, elements, screenshot };
  }

  /** uiautomator only reads the default display. */
  private async dumpNodeTree(): Promise<string | null> {
    const { channel, logger } = this.deps;
    const dumped = await executeCommand(channel, logger, TAG, { kind: "dump-hierarchy", path: DEVICE_DUMP_PATH });
    if (!dumped.success) {
      logger.warn(TAG, "Accessibility dump failed");
      return null;
    }
    const read = await executeCommand(channel, logger, TAG, { kind: "read-file", path: DEVICE_DUMP_PATH });
    const xml = read.output?.trim();
    if (!read.success || !xml) {
      logger.warn(TAG, "Accessibility dump could not be read");
      return null;
    }
    return xml;
  }
}

import type { ScreenshotFile } from "@sidescreen/shared";

import type { Logger } from "../logger.js";
import type { CommandChannel } from "../shell/channel.js";
import { executeCommand } from "../shell/exec.js";

/**
 * Hands out timestamped screenshot paths that never repeat within one
 * process, even when two captures land in the same millisecond.
 */
export class ScreenshotPaths {
  private last = 0;

  constructor(private readonly dir: string, private readonly prefix: string) {}

  next(): string {
    const timestamp = Math.max(Date.now(), this.last + 1);
    this.last = timestamp;
    return `${this.dir.replace(/\/+$/, "")}/${this.prefix}_${timestamp}.png`;
  }
}

/**
 * Captures into a fresh path and checks the file exists and is non-empty.
 */
export async function captureToFile(
  channel: CommandChannel,
  logger: Logger,
  tag: string,
  path: string,
  displayId?: number
): Promise<ScreenshotFile | null> {
  const capture = await executeCommand(channel, logger, tag, { kind: "capture", path, displayId });
  if (!capture.success) {
    logger.error(tag, `Screenshot failed: ${capture.error ?? "unknown error"}`);
    return null;
  }

  const stat = await executeCommand(channel, logger, tag, { kind: "file-size", path });
  const sizeBytes = stat.success ? Number.parseInt((stat.output ?? "").trim(), 10) : Number.NaN;
  if (!Number.isFinite(sizeBytes) || sizeBytes <= 0) {
    logger.error(tag, `Screenshot file missing or empty: ${path}`);
    return null;
  }

  logger.info(tag, `Screenshot saved: ${path} (${sizeBytes} bytes)`);
  return displayId === undefined ? { path, sizeBytes } : { path, sizeBytes, displayId };
}

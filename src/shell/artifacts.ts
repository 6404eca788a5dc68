/**
 * Readers for files the device writes (screenshots).
 */

import { readFile } from "node:fs/promises";

import type { Logger } from "../logger.js";
import { type AdbShellChannel, runProcess } from "./channel.js";

export interface ArtifactReader {
  /** Raw bytes of `path`, or null when it cannot be read. */
  read(path: string): Promise<Uint8Array | null>;
}

/**
 * Streams device files over `adb exec-out cat`, which keeps binary data intact.
 */
export class AdbArtifactReader implements ArtifactReader {
  constructor(
    private readonly channel: AdbShellChannel,
    private readonly logger: Logger,
    private readonly timeoutMs = 30_000
  ) {}

  async read(path: string): Promise<Uint8Array | null> {
    const proc = await runProcess(
      this.channel.adb,
      [...this.channel.deviceArgs(), "exec-out", "cat", path],
      this.timeoutMs
    );
    if (proc.exitCode !== 0 || proc.stdout.length === 0) {
      this.logger.warn("AdbArtifactReader", `Could not read ${path}`, proc.stderr.toString("utf-8").trim() || undefined);
      return null;
    }
    return new Uint8Array(proc.stdout);
  }
}

/** For a channel that runs on the device itself: the path is local. */
export class LocalArtifactReader implements ArtifactReader {
  constructor(private readonly logger: Logger) {}

  async read(path: string): Promise<Uint8Array | null> {
    try {
      const buffer = await readFile(path);
      return buffer.length > 0 ? new Uint8Array(buffer) : null;
    } catch (err) {
      this.logger.warn("LocalArtifactReader", `Could not read ${path}`, err);
      return null;
    }
  }
}

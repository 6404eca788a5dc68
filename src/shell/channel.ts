/**
 * Command execution channels.
 *
 * A channel runs one shell line with elevated privilege and reports
 * `{ success, output, error }`. It never throws for a failed command; a
 * rejected promise means the channel itself broke, and callers treat that
 * the same as a failed command.
 */

import { execFile } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import type { ShellCommandResult } from "@sidescreen/shared";

import { DEFAULT_COMMAND_TIMEOUT_MS, DEFAULT_MAX_RETRIES } from "../constants.js";
import type { Logger } from "../logger.js";

export interface CommandChannel {
  execute(command: string): Promise<ShellCommandResult>;
}

export interface ProcessResult {
  exitCode: number | null;
  stdout: Buffer;
  stderr: Buffer;
  timedOut: boolean;
  /** Set when the process could not be started at all (e.g. ENOENT). */
  spawnError?: string;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs a program without a shell in between and collects its output.
 * Never rejects.
 */
export function runProcess(file: string, args: string[], timeoutMs: number): Promise<ProcessResult> {
  return new Promise((resolve) => {
    execFile(
      file,
      args,
      { encoding: "buffer", timeout: timeoutMs, maxBuffer: MAX_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        const code = typeof error.code === "number" ? error.code : null;
        resolve({
          exitCode: code,
          stdout,
          stderr,
          timedOut: error.killed === true && code === null,
          spawnError: typeof error.code === "string" ? `${error.code}: ${error.message}` : undefined,
        });
      }
    );
  });
}

function toResult(proc: ProcessResult, timeoutMs: number): ShellCommandResult {
  const output = proc.stdout.toString("utf-8").trim();
  const stderr = proc.stderr.toString("utf-8").trim();
  if (proc.timedOut) {
    return { success: false, output, error: `Command timed out after ${timeoutMs}ms` };
  }
  if (proc.spawnError) {
    return { success: false, output, error: proc.spawnError };
  }
  if (proc.exitCode !== 0) {
    return { success: false, output, error: stderr || `exit code ${proc.exitCode ?? "unknown"}` };
  }
  return { success: true, output, error: stderr || undefined };
}

// ===========================================
// adb
// ===========================================

export interface AdbChannelOptions {
  adbPath?: string;
  serial?: string;
  timeoutMs?: number;
  retries?: number;
  /** First retry delay; doubles on every attempt. */
  retryBaseDelayMs?: number;
  logger?: Logger;
}

/** adb-side failures worth retrying: the device did not get the command at all. */
const TRANSPORT_ERROR = /^(adb: )?error:|device offline|no devices\/emulators found|device '[^']*' not found/m;

export function isTransportError(stderr: string): boolean {
  return TRANSPORT_ERROR.test(stderr);
}

/**
 * Runs commands on a device through `adb shell`. Transport failures are
 * retried with exponential backoff; a command that ran and failed is not.
 */
export class AdbShellChannel implements CommandChannel {
  private readonly adbPath: string;
  private readonly serial: string;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;

  constructor(private readonly options: AdbChannelOptions = {}) {
    this.adbPath = options.adbPath ?? "adb";
    this.serial = options.serial ?? "";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
  }

  /** Leading adb arguments that select the device. */
  deviceArgs(): string[] {
    return this.serial ? ["-s", this.serial] : [];
  }

  get adb(): string {
    return this.adbPath;
  }

  async execute(command: string): Promise<ShellCommandResult> {
    let result: ShellCommandResult = { success: false, error: "not executed" };
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      const proc = await runProcess(this.adbPath, [...this.deviceArgs(), "shell", command], this.timeoutMs);
      result = toResult(proc, this.timeoutMs);

      const stderr = proc.stderr.toString("utf-8");
      if (result.success || !isTransportError(stderr) || attempt === this.retries) {
        return result;
      }

      const delay = this.retryBaseDelayMs * 2 ** attempt;
      this.options.logger?.warn(
        "AdbShellChannel",
        `adb error (attempt ${attempt + 1}/${this.retries + 1}), retrying in ${delay}ms`,
        stderr.trim()
      );
      await sleep(delay);
    }
    return result;
  }
}

// ===========================================
// Local shell
// ===========================================

/**
 * Runs commands through `sh -c` on this machine. Meant for running directly
 * on a device that grants the process a privileged shell.
 */
export class LocalShellChannel implements CommandChannel {
  constructor(
    private readonly timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS,
    private readonly shell = "sh"
  ) {}

  async execute(command: string): Promise<ShellCommandResult> {
    const proc = await runProcess(this.shell, ["-c", command], this.timeoutMs);
    return toResult(proc, this.timeoutMs);
  }
}

// ===========================================
// Deadline wrapper
// ===========================================

/**
 * Bounds every call on `channel` to `timeoutMs`. A call that runs over, or
 * whose channel rejects, resolves to a failed result.
 */
export function withDeadline(channel: CommandChannel, timeoutMs: number): CommandChannel {
  return {
    async execute(command: string): Promise<ShellCommandResult> {
      const controller = new AbortController();
      const timeout = sleep(timeoutMs, undefined, { signal: controller.signal }).then(
        (): ShellCommandResult => ({ success: false, error: `Command timed out after ${timeoutMs}ms` }),
        (): ShellCommandResult => ({ success: false, error: "deadline cancelled" })
      );
      try {
        return await Promise.race([
          channel.execute(command).catch(
            (err: unknown): ShellCommandResult => ({
              success: false,
              error: err instanceof Error ? err.message : String(err),
            })
          ),
          timeout,
        ]);
      } finally {
        controller.abort();
      }
    },
  };
}

/**
 * Diagnostics for sidescreen.
 *
 * `Logger` is the port every component receives; nothing in the core logs
 * through a global. The CLI creates one logger at start-up and flushes it on
 * shutdown.
 *
 * `SessionLogger` writes the per-run step log: an incremental
 * `.partial.json` after each step (crash-safe) and a final `.json` summary.
 */

import { createWriteStream, mkdirSync, writeFileSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import type { AgentAction, ModelResponse } from "@sidescreen/shared";

import { MEMORY_LOG_CAPACITY } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(tag: string, message: string): void;
  info(tag: string, message: string): void;
  warn(tag: string, message: string, error?: unknown): void;
  error(tag: string, message: string, error?: unknown): void;
  /** Completes pending writes. Safe to call more than once. */
  flush(): Promise<void>;
}

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  tag: string;
  message: string;
  error?: string;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function formatEntry(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString();
  const suffix = entry.error ? `: ${entry.error}` : "";
  return `${time} ${entry.level.toUpperCase().padEnd(5)} [${entry.tag}] ${entry.message}${suffix}`;
}

abstract class BaseLogger implements Logger {
  constructor(private readonly minLevel: LogLevel) {}

  debug(tag: string, message: string): void {
    this.log("debug", tag, message);
  }

  info(tag: string, message: string): void {
    this.log("info", tag, message);
  }

  warn(tag: string, message: string, error?: unknown): void {
    this.log("warn", tag, message, error);
  }

  error(tag: string, message: string, error?: unknown): void {
    this.log("error", tag, message, error);
  }

  async flush(): Promise<void> {}

  protected abstract write(entry: LogEntry): void;

  private log(level: LogLevel, tag: string, message: string, error?: unknown): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) return;
    const entry: LogEntry = { timestamp: Date.now(), level, tag, message };
    if (error !== undefined) entry.error = describeError(error);
    this.write(entry);
  }
}

/**
 * Console output, plus an append-only file when `file` is given.
 */
export class ConsoleLogger extends BaseLogger {
  private stream: WriteStream | null = null;

  constructor(level: LogLevel = "info", file?: string) {
    super(level);
    if (file) {
      const stream = createWriteStream(file, { flags: "a" });
      stream.on("error", (err) => {
        console.error(`[Logger] Cannot write log file ${file}: ${describeError(err)}`);
        if (this.stream === stream) this.stream = null;
      });
      this.stream = stream;
    }
  }

  protected write(entry: LogEntry): void {
    const line = `[${entry.tag}] ${entry.message}${entry.error ? `: ${entry.error}` : ""}`;
    if (entry.level === "error" || entry.level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
    this.stream?.write(`${formatEntry(entry)}\n`);
  }

  override async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    // Errors are reported by the listener set up in the constructor
    await new Promise<void>((resolve) => {
      stream.once("error", () => resolve());
      stream.end(() => resolve());
    });
  }
}

/**
 * Keeps the most recent entries in memory.
 */
export class MemoryLogger extends BaseLogger {
  private entries: LogEntry[] = [];

  constructor(level: LogLevel = "debug", private readonly capacity = MEMORY_LOG_CAPACITY) {
    super(level);
  }

  protected write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  getEntries(level?: LogLevel): LogEntry[] {
    return level ? this.entries.filter((e) => e.level === level) : [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

// ===========================================
// Session step log
// ===========================================

export interface StepLog {
  step: number;
  timestamp: string;
  foregroundPackage: string | null;
  screenChanged: boolean;
  decision: {
    message: string;
    rationale?: string;
    action?: AgentAction;
    isComplete: boolean;
    needsTakeover: boolean;
  };
  outcome: {
    success: boolean;
    target: string;
    message: string;
  };
  decisionLatencyMs: number;
  actionLatencyMs: number;
}

export interface SessionSummary {
  sessionId: string;
  goal: string;
  provider: string;
  startTime: string;
  endTime: string;
  totalSteps: number;
  successCount: number;
  failCount: number;
  completed: boolean;
  steps: StepLog[];
}

export class SessionLogger {
  readonly sessionId: string;
  private steps: StepLog[] = [];
  private startTime: string;

  constructor(
    private readonly logDir: string,
    private readonly goal: string,
    private readonly provider: string
  ) {
    this.sessionId = `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
    this.startTime = new Date().toISOString();
    mkdirSync(this.logDir, { recursive: true });
  }

  get partialPath(): string {
    return join(this.logDir, `${this.sessionId}.partial.json`);
  }

  get finalPath(): string {
    return join(this.logDir, `${this.sessionId}.json`);
  }

  logStep(
    step: number,
    foregroundPackage: string | null,
    screenChanged: boolean,
    response: ModelResponse,
    outcome: { success: boolean; target: string; message: string },
    decisionLatencyMs: number,
    actionLatencyMs: number
  ): void {
    this.steps.push({
      step,
      timestamp: new Date().toISOString(),
      foregroundPackage,
      screenChanged,
      decision: {
        message: response.message,
        rationale: response.rationale,
        action: response.action,
        isComplete: response.isComplete,
        needsTakeover: response.needsTakeover,
      },
      outcome: {
        success: outcome.success,
        target: outcome.target,
        message: outcome.message,
      },
      decisionLatencyMs,
      actionLatencyMs,
    });

    writeFileSync(this.partialPath, JSON.stringify(this.buildSummary(false), null, 2));
  }

  /** Writes the final summary and returns its path. */
  finalize(completed: boolean): string {
    writeFileSync(this.finalPath, JSON.stringify(this.buildSummary(completed), null, 2));
    return this.finalPath;
  }

  buildSummary(completed: boolean): SessionSummary {
    return {
      sessionId: this.sessionId,
      goal: this.goal,
      provider: this.provider,
      startTime: this.startTime,
      endTime: new Date().toISOString(),
      totalSteps: this.steps.length,
      successCount: this.steps.filter((s) => s.outcome.success).length,
      failCount: this.steps.filter((s) => !s.outcome.success).length,
      completed,
      steps: this.steps,
    };
  }
}

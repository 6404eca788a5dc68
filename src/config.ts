/**
 * Configuration management for sidescreen.
 * Values come from the environment; a `.env` file in the working directory
 * is loaded first when present.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import dotenv from "dotenv";

import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_DISPLAY_DPI,
  DEFAULT_DISPLAY_HEIGHT,
  DEFAULT_DISPLAY_NAME,
  DEFAULT_DISPLAY_WIDTH,
  DEFAULT_FALLBACK_DISPLAY_ID,
  DEFAULT_LOG_DIR,
  DEFAULT_MAX_ELEMENTS,
  DEFAULT_MAX_FAILURES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_STEPS,
  DEFAULT_READY_DELAY_MS,
  DEFAULT_RESOLVE_ATTEMPTS,
  DEFAULT_SCREENSHOT_DIR,
  DEFAULT_STEP_DELAY,
  DEFAULT_STUCK_THRESHOLD,
} from "./constants.js";
import type { LogLevel } from "./logger.js";

export type ShellMode = "adb" | "local";
export type InputMethodKind = "shell" | "broadcast";

export interface AppConfig {
  ADB_PATH: string;
  ADB_SERIAL: string;
  SHELL_MODE: ShellMode;
  COMMAND_TIMEOUT_MS: number;
  /** Transport retries of the adb channel. */
  MAX_RETRIES: number;

  VIRTUAL_DISPLAY: boolean;
  VD_WIDTH: number;
  VD_HEIGHT: number;
  VD_DPI: number;
  VD_NAME: string;
  VD_FALLBACK_ID: number;
  VD_READY_DELAY_MS: number;
  VD_RESOLVE_ATTEMPTS: number;
  SCREENSHOT_DIR: string;
  INPUT_METHOD: InputMethodKind;

  MAX_STEPS: number;
  /** Consecutive failed actions before the loop hands off. */
  MAX_FAILURES: number;
  STEP_DELAY: number;
  STUCK_THRESHOLD: number;
  MAX_ELEMENTS: number;

  LOG_DIR: string;
  LOG_LEVEL: LogLevel;
  LOG_FILE: string;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const DISPLAY_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

type Env = Record<string, string | undefined>;

/**
 * Loads `.env` from the working directory into `process.env`, if the file exists.
 * Variables already set in the environment win.
 */
export function loadDotenv(cwd = process.cwd()): string | null {
  const envPath = resolve(cwd, ".env");
  if (!existsSync(envPath)) return null;
  dotenv.config({ path: envPath });
  return envPath;
}

function parseInteger(env: Env, key: string, fallback: number, min: number, errors: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    errors.push(`${key} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return value;
}

function parseNumber(env: Env, key: string, fallback: number, errors: string[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    errors.push(`${key} must be a number >= 0 (got "${raw}")`);
    return fallback;
  }
  return value;
}

function parseBoolean(env: Env, key: string, fallback: boolean, errors: string[]): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  errors.push(`${key} must be true or false (got "${raw}")`);
  return fallback;
}

function parseChoice<T extends string>(
  env: Env,
  key: string,
  choices: readonly T[],
  fallback: T,
  errors: string[]
): T {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const match = choices.find((c) => c === raw);
  if (!match) {
    errors.push(`${key} must be one of ${choices.join(", ")} (got "${raw}")`);
    return fallback;
  }
  return match;
}

/**
 * Reads every setting from `env`. Throws one Error listing all invalid values.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const errors: string[] = [];

  const name = env.VD_NAME?.trim() || DEFAULT_DISPLAY_NAME;
  if (!DISPLAY_NAME_PATTERN.test(name)) {
    errors.push(`VD_NAME may only contain letters, digits, '_', '.' and '-' (got "${name}")`);
  }

  const config: AppConfig = {
    ADB_PATH: env.ADB_PATH?.trim() || "adb",
    ADB_SERIAL: env.ADB_SERIAL?.trim() ?? "",
    SHELL_MODE: parseChoice(env, "SHELL_MODE", ["adb", "local"] as const, "adb", errors),
    COMMAND_TIMEOUT_MS: parseInteger(env, "COMMAND_TIMEOUT_MS", DEFAULT_COMMAND_TIMEOUT_MS, 1, errors),
    MAX_RETRIES: parseInteger(env, "MAX_RETRIES", DEFAULT_MAX_RETRIES, 0, errors),

    VIRTUAL_DISPLAY: parseBoolean(env, "VIRTUAL_DISPLAY", true, errors),
    VD_WIDTH: parseInteger(env, "VD_WIDTH", DEFAULT_DISPLAY_WIDTH, 1, errors),
    VD_HEIGHT: parseInteger(env, "VD_HEIGHT", DEFAULT_DISPLAY_HEIGHT, 1, errors),
    VD_DPI: parseInteger(env, "VD_DPI", DEFAULT_DISPLAY_DPI, 1, errors),
    VD_NAME: name,
    VD_FALLBACK_ID: parseInteger(env, "VD_FALLBACK_ID", DEFAULT_FALLBACK_DISPLAY_ID, 0, errors),
    VD_READY_DELAY_MS: parseInteger(env, "VD_READY_DELAY_MS", DEFAULT_READY_DELAY_MS, 0, errors),
    VD_RESOLVE_ATTEMPTS: parseInteger(env, "VD_RESOLVE_ATTEMPTS", DEFAULT_RESOLVE_ATTEMPTS, 1, errors),
    SCREENSHOT_DIR: env.SCREENSHOT_DIR?.trim() || DEFAULT_SCREENSHOT_DIR,
    INPUT_METHOD: parseChoice(env, "INPUT_METHOD", ["shell", "broadcast"] as const, "broadcast", errors),

    MAX_STEPS: parseInteger(env, "MAX_STEPS", DEFAULT_MAX_STEPS, 1, errors),
    MAX_FAILURES: parseInteger(env, "MAX_FAILURES", DEFAULT_MAX_FAILURES, 1, errors),
    STEP_DELAY: parseNumber(env, "STEP_DELAY", DEFAULT_STEP_DELAY, errors),
    STUCK_THRESHOLD: parseInteger(env, "STUCK_THRESHOLD", DEFAULT_STUCK_THRESHOLD, 1, errors),
    MAX_ELEMENTS: parseInteger(env, "MAX_ELEMENTS", DEFAULT_MAX_ELEMENTS, 1, errors),

    LOG_DIR: env.LOG_DIR?.trim() || DEFAULT_LOG_DIR,
    LOG_LEVEL: parseChoice(env, "LOG_LEVEL", LOG_LEVELS, "info", errors),
    LOG_FILE: env.LOG_FILE?.trim() ?? "",
  };

  if (errors.length > 0) {
    throw new Error(["Invalid configuration:", ...errors.map((e) => `- ${e}`)].join("\n"));
  }
  return config;
}

/**
 * Wire-format handling for the action protocol: validation of decision-maker
 * output and helpers over the shared types.
 */

import { z } from "zod";
import {
  ACTION_TYPES,
  type ActionType,
  type AgentAction,
  type ModelResponse,
  type Point,
  type ScreenContext,
} from "@sidescreen/shared";

// ===========================================
// Coordinate Sanitization
// ===========================================

const MAX_COORDINATE = 10000;

/**
 * Repairs coordinates from loosely-formatted model output.
 * Handles: [x, y] arrays (numbers or numeric strings), "x, y" strings,
 * {x, y} objects and single concatenated numbers such as 8282017.
 * Returns undefined when nothing sensible can be recovered.
 */
export function sanitizeCoordinates(raw: unknown): Point | undefined {
  if (raw == null) return undefined;

  if (Array.isArray(raw) && raw.length >= 2) {
    const x = Number(raw[0]);
    const y = Number(raw[1]);
    if (inRange(x) && inRange(y)) {
      return [Math.round(x), Math.round(y)];
    }
  }

  if (Array.isArray(raw) && raw.length === 1) {
    const split = trySplitConcatenated(Number(raw[0]));
    if (split) return split;
  }

  if (typeof raw === "number" && raw > MAX_COORDINATE) {
    const split = trySplitConcatenated(raw);
    if (split) return split;
  }

  if (typeof raw === "string") {
    const parts = raw.trim().split(/[,\s]+/).map(Number);
    if (parts.length >= 2 && inRange(parts[0]) && inRange(parts[1])) {
      return [Math.round(parts[0]), Math.round(parts[1])];
    }
  }

  if (typeof raw === "object" && raw !== null && "x" in raw && "y" in raw) {
    const x = Number(raw.x);
    const y = Number(raw.y);
    if (raw.x !== undefined && raw.y !== undefined && inRange(x) && inRange(y)) {
      return [Math.round(x), Math.round(y)];
    }
  }

  return undefined;
}

function inRange(n: number): boolean {
  return Number.isFinite(n) && n >= 0 && n <= MAX_COORDINATE;
}

/**
 * Splits a concatenated number like 8282017 into [828, 2017], trying 2-4
 * digits for x.
 */
function trySplitConcatenated(n: number): Point | null {
  if (!Number.isFinite(n) || n <= 0) return null;
  const s = String(Math.round(n));
  for (let i = 2; i <= Math.min(4, s.length - 2); i++) {
    const x = parseInt(s.slice(0, i), 10);
    const y = parseInt(s.slice(i), 10);
    if (x > 0 && x <= 3000 && y > 0 && y <= 5000) {
      return [x, y];
    }
  }
  return null;
}

// ===========================================
// Action types
// ===========================================

const ACTION_ALIASES: Record<string, ActionType> = {
  CLICK: "TAP",
  PRESS: "TAP",
  LAUNCH: "LAUNCH_APP",
  OPEN_APP: "LAUNCH_APP",
  INPUT: "TYPE",
  INPUT_TEXT: "TYPE",
  DONE: "COMPLETE",
  FINISH: "COMPLETE",
};

function isActionType(value: string): value is ActionType {
  return ACTION_TYPES.some((type) => type === value);
}

/** Maps a free-form action name onto the vocabulary; anything else is UNKNOWN. */
export function normalizeActionType(raw: string): ActionType {
  const key = raw.trim().toUpperCase().replace(/[\s-]+/g, "_");
  if (isActionType(key)) return key;
  return ACTION_ALIASES[key] ?? "UNKNOWN";
}

// ===========================================
// Wire schema
// ===========================================

const wireActionSchema = z.object({
  actionType: z.string().min(1),
  points: z.array(z.unknown()).optional(),
  text: z.string().optional(),
  app: z.string().optional(),
  targetApp: z.string().optional(),
  durationMs: z.number().finite().nonnegative().optional(),
});

const wireResponseSchema = z.object({
  message: z.string().default(""),
  rationale: z.string().optional(),
  thinking: z.string().optional(),
  action: wireActionSchema.nullish(),
  isComplete: z.boolean().default(false),
  needsConfirmation: z.boolean().default(false),
  needsTakeover: z.boolean().default(false),
});

type WireAction = z.infer<typeof wireActionSchema>;

function toAgentAction(wire: WireAction): AgentAction {
  const points = wire.points
    ?.map(sanitizeCoordinates)
    .filter((p): p is Point => p !== undefined);
  const targetApp = wire.targetApp ?? wire.app;

  return {
    actionType: normalizeActionType(wire.actionType),
    ...(points && points.length > 0 ? { points } : {}),
    ...(wire.text !== undefined ? { text: wire.text } : {}),
    ...(targetApp !== undefined ? { targetApp } : {}),
    ...(wire.durationMs !== undefined ? { durationMs: Math.round(wire.durationMs) } : {}),
  };
}

function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Models wrap JSON in prose or code fences; take the outermost object
    const match = text.match(/\{[\s\S]*\}/);
    if (!match) return undefined;
    try {
      return JSON.parse(match[0].replace(/[\r\n]/g, " "));
    } catch {
      return undefined;
    }
  }
}

/**
 * Validates one decision-maker response given as text or as a parsed value.
 * Returns null when it cannot be read as a response at all.
 */
export function parseModelResponse(raw: unknown): ModelResponse | null {
  const value = typeof raw === "string" ? parseJsonText(raw) : raw;
  const parsed = wireResponseSchema.safeParse(value);
  if (!parsed.success) return null;

  const wire = parsed.data;
  const rationale = wire.rationale ?? wire.thinking;
  return {
    message: wire.message,
    ...(rationale !== undefined ? { rationale } : {}),
    ...(wire.action ? { action: toAgentAction(wire.action) } : {}),
    isComplete: wire.isComplete,
    needsConfirmation: wire.needsConfirmation,
    needsTakeover: wire.needsTakeover,
  };
}

/** Wire form of a response (`targetApp` travels as `app`). */
export function toWireResponse(response: ModelResponse): Record<string, unknown> {
  const { action, ...rest } = response;
  if (!action) return { ...rest };
  const { targetApp, ...actionRest } = action;
  return {
    ...rest,
    action: targetApp === undefined ? actionRest : { ...actionRest, app: targetApp },
  };
}

// ===========================================
// Screen context
// ===========================================

function bytesEqual(a: Uint8Array | undefined, b: Uint8Array | undefined): boolean {
  if (a === b) return true;
  if (!a || !b || a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Content equality; screenshots are compared byte by byte. */
export function screenContextEquals(a: ScreenContext, b: ScreenContext): boolean {
  return (
    bytesEqual(a.screenshotBytes, b.screenshotBytes) &&
    a.nodeTreeText === b.nodeTreeText &&
    a.foregroundPackage === b.foregroundPackage &&
    a.foregroundActivity === b.foregroundActivity
  );
}

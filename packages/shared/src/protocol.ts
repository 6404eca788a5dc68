import type { Point } from "./types.js";

export const ACTION_TYPES = [
  "TAP",
  "SWIPE",
  "SCROLL",
  "TYPE",
  "LAUNCH_APP",
  "BACK",
  "HOME",
  "SCREENSHOT",
  "WAIT",
  "COMPLETE",
  "UNKNOWN",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

/**
 * One instruction from the decision-maker. Consumed exactly once by the
 * dispatcher and never mutated.
 *
 * `points` holds the tap target for TAP, and [start, end] for SWIPE/SCROLL.
 */
export interface AgentAction {
  readonly actionType: ActionType;
  readonly points?: readonly Point[];
  readonly text?: string;
  readonly targetApp?: string;
  readonly durationMs?: number;
}

export interface ModelResponse {
  readonly message: string;
  readonly rationale?: string;
  /** Absent means a message-only turn. */
  readonly action?: AgentAction;
  readonly isComplete: boolean;
  readonly needsConfirmation: boolean;
  readonly needsTakeover: boolean;
}

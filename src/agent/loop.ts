/**
 * The decision loop.
 *
 * Each step:
 *   observe -> decide -> (confirm) -> dispatch -> log
 *
 * Stops on completion, on a handoff request, after too many consecutive
 * failed actions, when the step budget runs out or when aborted.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ModelResponse, ScreenContext } from "@sidescreen/shared";

import type { ActionDispatcher, DispatchOutcome } from "../actions.js";
import {
  DEFAULT_MAX_FAILURES,
  DEFAULT_MAX_STEPS,
  DEFAULT_STEP_DELAY,
  DEFAULT_STUCK_THRESHOLD,
} from "../constants.js";
import { describeError, type Logger, type SessionLogger } from "../logger.js";
import { screenContextEquals } from "../protocol.js";
import type { ModelProvider } from "./model.js";
import type { ScreenObserver } from "./observer.js";

const TAG = "Agent";

export type AgentStopReason = "completed" | "handoff" | "declined" | "max-steps" | "aborted";

export interface AgentResult {
  success: boolean;
  stepsUsed: number;
  reason: AgentStopReason;
  /** Last message from the decision-maker. */
  message: string;
}

export interface AgentOptions {
  maxSteps?: number;
  /** Pause after each step, in seconds. */
  stepDelay?: number;
  /** Consecutive failed actions before handing off. */
  maxFailures?: number;
  /** Unchanged screens in a row before the loop warns. */
  stuckThreshold?: number;
  signal?: AbortSignal;
  /** Asked before running an action flagged for confirmation. */
  confirm?: (response: ModelResponse) => Promise<boolean>;
}

export interface AgentDeps {
  provider: ModelProvider;
  observer: ScreenObserver;
  dispatcher: ActionDispatcher;
  logger: Logger;
  session?: SessionLogger;
}

function messageOnly(message: string): ModelResponse {
  return { message, isComplete: false, needsConfirmation: false, needsTakeover: false };
}

function skipped(response: ModelResponse, message: string, success: boolean): DispatchOutcome {
  return {
    actionType: response.action?.actionType ?? null,
    target: "none",
    success,
    shouldFinish: true,
    message,
  };
}

export async function runAgent(goal: string, deps: AgentDeps, options: AgentOptions = {}): Promise<AgentResult> {
  const { provider, observer, dispatcher, logger, session } = deps;
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  const stepDelayMs = Math.round((options.stepDelay ?? DEFAULT_STEP_DELAY) * 1000);
  const maxFailures = options.maxFailures ?? DEFAULT_MAX_FAILURES;
  const stuckThreshold = options.stuckThreshold ?? DEFAULT_STUCK_THRESHOLD;
  const signal = options.signal;

  logger.info(TAG, `Goal: ${goal}`);
  logger.info(TAG, `Provider: ${provider.providerName} | Max steps: ${maxSteps}`);

  let previous: ScreenContext | null = null;
  let stuckCount = 0;
  let failures = 0;
  let lastMessage = "";

  const finish = (reason: AgentStopReason, stepsUsed: number): AgentResult => {
    const success = reason === "completed";
    const path = session?.finalize(success);
    if (path) logger.info(TAG, `Session log: ${path}`);
    return { success, stepsUsed, reason, message: lastMessage };
  };

  if (!provider.supportsAgentMode) {
    lastMessage = `${provider.providerName} only chats and cannot drive the device`;
    logger.error(TAG, lastMessage);
    return finish("handoff", 0);
  }

  for (let step = 0; step < maxSteps; step++) {
    if (signal?.aborted) return finish("aborted", step);
    logger.info(TAG, `--- Step ${step + 1}/${maxSteps} ---`);

    // 1. Observe
    const { context, elements } = await observer.observe();
    const screenChanged = previous === null || !screenContextEquals(previous, context);
    if (screenChanged) {
      stuckCount = 0;
    } else {
      stuckCount++;
      logger.warn(TAG, `Screen unchanged for ${stuckCount} step(s)`);
      if (stuckCount >= stuckThreshold) {
        logger.warn(TAG, `Stuck for ${stuckCount} steps; the last actions are having no effect`);
      }
    }
    previous = context;

    // 2. Decide
    const decisionStart = performance.now();
    let response: ModelResponse;
    try {
      response = await provider.processQuery(goal, context, elements);
    } catch (err) {
      logger.error(TAG, "Decision failed", err);
      response = messageOnly(`Decision failed: ${describeError(err)}`);
    }
    const decisionLatency = Math.round(performance.now() - decisionStart);
    lastMessage = response.message;
    if (response.rationale) logger.info(TAG, `Think: ${response.rationale}`);
    logger.info(TAG, `Decision: ${response.action?.actionType ?? "none"} (${response.message}) ${decisionLatency}ms`);

    // 3. Handoff and confirmation gates
    if (response.needsTakeover) {
      logger.warn(TAG, "Decision-maker asked for a human to take over");
      session?.logStep(step + 1, context.foregroundPackage ?? null, screenChanged, response, skipped(response, "Handed off", true), decisionLatency, 0);
      return finish("handoff", step + 1);
    }
    if (response.needsConfirmation && response.action && options.confirm) {
      const approved = await options.confirm(response);
      if (!approved) {
        logger.info(TAG, "Action declined");
        session?.logStep(step + 1, context.foregroundPackage ?? null, screenChanged, response, skipped(response, "Declined", false), decisionLatency, 0);
        return finish("declined", step + 1);
      }
    }

    // 4. Dispatch
    const actionStart = performance.now();
    const outcome = await dispatcher.dispatch(response, { signal });
    const actionLatency = Math.round(performance.now() - actionStart);
    logger.info(TAG, `${outcome.success ? "OK" : "FAILED"} on ${outcome.target}: ${outcome.message}`);
    session?.logStep(step + 1, context.foregroundPackage ?? null, screenChanged, response, outcome, decisionLatency, actionLatency);

    if (outcome.shouldFinish) {
      return finish("completed", step + 1);
    }

    failures = outcome.success ? 0 : failures + 1;
    if (failures >= maxFailures) {
      logger.warn(TAG, `${failures} failed actions in a row; handing off`);
      return finish("handoff", step + 1);
    }

    if (step < maxSteps - 1 && stepDelayMs > 0) {
      try {
        await sleep(stepDelayMs, undefined, { signal });
      } catch (err) {
        if (signal?.aborted) return finish("aborted", step + 1);
        throw err;
      }
    }
  }

  logger.warn(TAG, "Max steps reached; task may be incomplete");
  return finish("max-steps", maxSteps);
}

/**
 * Action dispatch for sidescreen.
 * Routes one decision to the virtual display when a session is active and to
 * the primary display otherwise.
 *
 * Supported actions (11):
 *   TAP, SWIPE, SCROLL, TYPE, LAUNCH_APP, BACK, HOME, SCREENSHOT, WAIT,
 *   COMPLETE, UNKNOWN
 *
 * Dispatch never retries; the decision loop owns that policy.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ActionType, AgentAction, ModelResponse, Point, ScreenshotFile } from "@sidescreen/shared";

import { computeSwipeCoords, SWIPE_COORDS, SWIPE_DURATION_MS, type SwipeCoords, type SwipeDirection } from "./constants.js";
import type { AppLauncher } from "./display/app-launcher.js";
import type { InputTarget } from "./display/input-target.js";
import type { ScreenController } from "./display/screen.js";
import type { VirtualDisplayManager } from "./display/virtual-display.js";
import { describeError, type Logger } from "./logger.js";

const TAG = "ActionDispatcher";
const MAX_COORDINATE = 10000;

export type DispatchTarget = "virtual" | "primary" | "none";

export interface DispatchOutcome {
  actionType: ActionType | null;
  target: DispatchTarget;
  success: boolean;
  /** True when the decision loop should stop after this step. */
  shouldFinish: boolean;
  message: string;
  screenshot?: ScreenshotFile;
}

export interface DispatchOptions {
  /** Cancels a pending WAIT. */
  signal?: AbortSignal;
}

export interface ActionDispatcherDeps {
  screen: ScreenController;
  virtualDisplay: VirtualDisplayManager;
  launcher: AppLauncher;
  logger: Logger;
}

interface Route {
  target: Exclude<DispatchTarget, "none">;
  input: InputTarget;
  displayId?: number;
}

type ActionResult = Pick<DispatchOutcome, "success" | "message" | "screenshot">;

function validPoint(point: Point | undefined): point is Point {
  if (!point) return false;
  return point.every((n) => Number.isFinite(n) && n >= 0 && n <= MAX_COORDINATE);
}

function fail(message: string): ActionResult {
  return { success: false, message };
}

export class ActionDispatcher {
  private readonly screen: ScreenController;
  private readonly virtualDisplay: VirtualDisplayManager;
  private readonly launcher: AppLauncher;
  private readonly logger: Logger;
  private swipeCoords: Record<SwipeDirection, SwipeCoords> = SWIPE_COORDS;

  constructor(deps: ActionDispatcherDeps) {
    this.screen = deps.screen;
    this.virtualDisplay = deps.virtualDisplay;
    this.launcher = deps.launcher;
    this.logger = deps.logger;
  }

  /** Rescales the primary display's default scroll vector. */
  setScreenResolution(width: number, height: number): void {
    this.swipeCoords = computeSwipeCoords(width, height);
  }

  async dispatch(response: ModelResponse, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const action = response.action;
    if (!action) {
      return {
        actionType: null,
        target: "none",
        success: true,
        shouldFinish: response.isComplete,
        message: response.isComplete ? "Goal complete" : "No action",
      };
    }

    const route = this.route();
    const usesTarget = action.actionType !== "WAIT" && action.actionType !== "COMPLETE" && action.actionType !== "UNKNOWN";
    const target: DispatchTarget = usesTarget ? route.target : "none";

    let result: ActionResult;
    try {
      result = await this.execute(action, route, options);
    } catch (err) {
      this.logger.error(TAG, `${action.actionType} failed`, err);
      result = fail(`${action.actionType} failed: ${describeError(err)}`);
    }

    return {
      actionType: action.actionType,
      target,
      ...result,
      shouldFinish: response.isComplete || action.actionType === "COMPLETE",
    };
  }

  private route(): Route {
    const displayId = this.virtualDisplay.getDisplayId();
    if (displayId !== null) {
      return { target: "virtual", input: this.virtualDisplay, displayId };
    }
    return { target: "primary", input: this.screen };
  }

  private async execute(action: AgentAction, route: Route, options: DispatchOptions): Promise<ActionResult> {
    switch (action.actionType) {
      case "TAP":
        return this.executeTap(action, route);
      case "SWIPE":
        return this.executeSwipe(action, route);
      case "SCROLL":
        return this.executeScroll(action, route);
      case "TYPE":
        return this.executeType(action, route);
      case "LAUNCH_APP":
        return this.executeLaunch(action, route);
      case "BACK":
        return this.report(await route.input.pressBack(), "Went back");
      case "HOME":
        return this.report(await route.input.pressHome(), "Went home");
      case "SCREENSHOT":
        return this.executeScreenshot(route);
      case "WAIT":
        return this.executeWait(action, options.signal);
      case "COMPLETE":
        return { success: true, message: "Goal complete" };
      case "UNKNOWN":
        this.logger.warn(TAG, `Unknown action, nothing dispatched: ${JSON.stringify(action)}`);
        return fail("Unknown action");
    }
  }

  private report(success: boolean, message: string): ActionResult {
    return success ? { success, message } : fail(`${message}: command failed`);
  }

  private async executeTap(action: AgentAction, route: Route): Promise<ActionResult> {
    const point = action.points?.[0];
    if (!validPoint(point)) return fail("TAP needs one valid point");
    const [x, y] = point;
    return this.report(await route.input.tap(x, y), `Tapped (${x}, ${y})`);
  }

  private async executeSwipe(action: AgentAction, route: Route): Promise<ActionResult> {
    const start = action.points?.[0];
    const end = action.points?.[1];
    if (!validPoint(start) || !validPoint(end)) return fail("SWIPE needs a start and an end point");
    const [x1, y1] = start;
    const [x2, y2] = end;
    const ok = await route.input.swipe(x1, y1, x2, y2, action.durationMs ?? SWIPE_DURATION_MS);
    return this.report(ok, `Swiped (${x1}, ${y1}) -> (${x2}, ${y2})`);
  }

  /** A swipe held to one column; without points, an upward scroll. */
  private async executeScroll(action: AgentAction, route: Route): Promise<ActionResult> {
    const start = action.points?.[0];
    const end = action.points?.[1];
    let coords: SwipeCoords;
    if (start !== undefined || end !== undefined) {
      if (!validPoint(start) || !validPoint(end)) return fail("SCROLL needs a start and an end point");
      coords = [start[0], start[1], start[0], end[1]];
    } else {
      coords = this.defaultScroll(route);
    }
    const [x1, y1, x2, y2] = coords;
    const ok = await route.input.swipe(x1, y1, x2, y2, action.durationMs ?? SWIPE_DURATION_MS);
    return this.report(ok, `Scrolled (${x1}, ${y1}) -> (${x2}, ${y2})`);
  }

  private defaultScroll(route: Route): SwipeCoords {
    const session = route.target === "virtual" ? this.virtualDisplay.getSession() : null;
    if (session) {
      return computeSwipeCoords(session.width, session.height).up;
    }
    return this.swipeCoords.up;
  }

  private async executeType(action: AgentAction, route: Route): Promise<ActionResult> {
    const text = action.text;
    if (!text) return fail("TYPE needs text");
    const ok = await this.screen.inputText(text, route.displayId);
    return this.report(ok, `Typed "${text}"`);
  }

  private async executeLaunch(action: AgentAction, route: Route): Promise<ActionResult> {
    const app = action.targetApp?.trim();
    if (!app) return fail("LAUNCH_APP needs a target app");
    const ok = await this.launcher.launch(app, route.displayId);
    return this.report(ok, `Launched ${app}`);
  }

  private async executeScreenshot(route: Route): Promise<ActionResult> {
    const screenshot = await route.input.captureScreenshot();
    if (!screenshot) return fail("Screenshot failed");
    return { success: true, message: `Saved ${screenshot.path}`, screenshot };
  }

  private async executeWait(action: AgentAction, signal: AbortSignal | undefined): Promise<ActionResult> {
    const durationMs = action.durationMs;
    if (durationMs === undefined || !Number.isFinite(durationMs) || durationMs < 0) {
      return fail("WAIT needs a non-negative durationMs");
    }
    try {
      await sleep(durationMs, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) {
        this.logger.info(TAG, `Wait of ${durationMs}ms cancelled`);
        return fail("Wait cancelled");
      }
      throw err;
    }
    return { success: true, message: `Waited ${durationMs}ms` };
  }
}

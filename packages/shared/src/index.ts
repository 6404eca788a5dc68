export type {
  Point,
  UIElement,
  ScreenContext,
  ShellCommandResult,
  DisplaySessionState,
  DisplaySession,
  ScreenshotFile,
} from "./types.js";
export { ACTION_TYPES } from "./protocol.js";
export type { ActionType, AgentAction, ModelResponse } from "./protocol.js";

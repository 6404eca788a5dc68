/** Pixel coordinate pair on a display: [x, y]. */
export type Point = readonly [number, number];

export interface UIElement {
  id: string;
  text: string;
  type: string;
  bounds: string;
  center: [number, number];
  size: [number, number];
  clickable: boolean;
  editable: boolean;
  enabled: boolean;
  checked: boolean;
  focused: boolean;
  selected: boolean;
  scrollable: boolean;
  longClickable: boolean;
  password: boolean;
  hint: string;
  action: "tap" | "type" | "longpress" | "scroll" | "read";
  parent: string;
  depth: number;
}

/**
 * What the decision-maker sees in one cycle. Built fresh every cycle and
 * dropped afterwards.
 */
export interface ScreenContext {
  screenshotBytes?: Uint8Array;
  nodeTreeText?: string;
  foregroundPackage?: string;
  foregroundActivity?: string;
}

/** Outcome of one privileged shell invocation. */
export interface ShellCommandResult {
  readonly success: boolean;
  readonly output?: string;
  readonly error?: string;
}

export type DisplaySessionState = "inactive" | "creating" | "active" | "removing";

export interface DisplaySession {
  displayId: number;
  width: number;
  height: number;
  dpi: number;
  name: string;
}

export interface ScreenshotFile {
  /** Device-side path; transient, the caller owns retention. */
  path: string;
  sizeBytes: number;
  /** Unset for the primary display. */
  displayId?: number;
}

/**
 * Typed shell commands and their wire form.
 *
 * Every command the core sends to the device is built here, so the exact
 * strings can be tested without a shell. `displayId` scopes an input or
 * capture command to a virtual display; without it the primary display is
 * used.
 */

import { IME_BROADCAST_ACTION, LAUNCHER_CATEGORY } from "../constants.js";

export type ShellCommand =
  | { kind: "create-display"; width: number; height: number; density: number; name: string }
  | { kind: "remove-display"; displayId: number }
  | { kind: "list-displays" }
  | { kind: "capture"; path: string; displayId?: number }
  | { kind: "tap"; x: number; y: number; displayId?: number }
  | { kind: "swipe"; x1: number; y1: number; x2: number; y2: number; durationMs: number; displayId?: number }
  | { kind: "keyevent"; keyCode: number; displayId?: number }
  | { kind: "input-text"; text: string; displayId?: number }
  | { kind: "ime-text"; text: string }
  | { kind: "file-size"; path: string }
  | { kind: "display-size" }
  | { kind: "launch-package"; packageName: string }
  | { kind: "resolve-launcher"; packageName: string }
  | { kind: "start-activity"; component: string; displayId: number }
  | { kind: "foreground-activity" }
  | { kind: "dump-hierarchy"; path: string }
  | { kind: "read-file"; path: string };

export type ShellCommandKind = ShellCommand["kind"];

const SAFE_TOKEN = /^[A-Za-z0-9_.\-/]+$/;

function int(value: number, label: string): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`${label} must be a finite number (got ${value})`);
  }
  return String(Math.round(value));
}

/** Tokens end up unquoted in a shell line, so only a conservative alphabet is allowed. */
function token(value: string, label: string): string {
  if (!SAFE_TOKEN.test(value)) {
    throw new RangeError(`${label} contains unsupported characters: ${JSON.stringify(value)}`);
  }
  return value;
}

function displayFlag(displayId: number | undefined): string[] {
  return displayId === undefined ? [] : ["-d", int(displayId, "displayId")];
}

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;
const SHELL_SPECIAL = /[\\"'`$!?&|;()[\]{}<>*~#]/g;

/**
 * Escapes text for `input text`: spaces become %s and shell metacharacters
 * are backslash-escaped in one pass. Control characters would end the shell
 * line, so they are rejected with a RangeError.
 */
export function escapeInputText(text: string): string {
  if (CONTROL_CHARS.test(text)) {
    throw new RangeError(`text contains control characters: ${JSON.stringify(text)}`);
  }
  return text.replace(SHELL_SPECIAL, (c) => `\\${c}`).replaceAll(" ", "%s");
}

/**
 * Serializes a command to the exact line the privileged shell runs.
 * Throws RangeError on a non-finite number or an unsafe token.
 */
export function serializeCommand(command: ShellCommand): string {
  switch (command.kind) {
    case "create-display":
      return [
        "wm", "create-display",
        "--width", int(command.width, "width"),
        "--height", int(command.height, "height"),
        "--density", int(command.density, "density"),
        token(command.name, "name"),
      ].join(" ");
    case "remove-display":
      return `wm remove-display ${int(command.displayId, "displayId")}`;
    case "list-displays":
      return "dumpsys display displays";
    case "capture":
      return ["screencap", ...displayFlag(command.displayId), "-p", token(command.path, "path")].join(" ");
    case "tap":
      return ["input", ...displayFlag(command.displayId), "tap", int(command.x, "x"), int(command.y, "y")].join(" ");
    case "swipe":
      return [
        "input", ...displayFlag(command.displayId), "swipe",
        int(command.x1, "x1"), int(command.y1, "y1"),
        int(command.x2, "x2"), int(command.y2, "y2"),
        int(command.durationMs, "durationMs"),
      ].join(" ");
    case "keyevent":
      return ["input", ...displayFlag(command.displayId), "keyevent", int(command.keyCode, "keyCode")].join(" ");
    case "input-text":
      return ["input", ...displayFlag(command.displayId), "text", escapeInputText(command.text)].join(" ");
    case "ime-text":
      return `am broadcast -a ${IME_BROADCAST_ACTION} --es msg ${Buffer.from(command.text, "utf-8").toString("base64")}`;
    case "file-size":
      return `stat -c %s ${token(command.path, "path")}`;
    case "display-size":
      return "wm size";
    case "launch-package":
      return `monkey -p ${token(command.packageName, "packageName")} -c ${LAUNCHER_CATEGORY} 1`;
    case "resolve-launcher":
      return `cmd package resolve-activity --brief -c ${LAUNCHER_CATEGORY} ${token(command.packageName, "packageName")}`;
    case "start-activity":
      return `am start --display ${int(command.displayId, "displayId")} -n ${token(command.component, "component")}`;
    case "foreground-activity":
      return "dumpsys activity activities";
    case "dump-hierarchy":
      return `uiautomator dump ${token(command.path, "path")}`;
    case "read-file":
      return `cat ${token(command.path, "path")}`;
  }
}

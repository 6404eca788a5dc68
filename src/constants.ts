/**
 * Constants for sidescreen.
 * All magic strings, key codes and fixed values in one place.
 */

// ===========================================
// Android Key Codes
// ===========================================
export const KEYCODE_HOME = 3;
export const KEYCODE_BACK = 4;

// ===========================================
// Default Screen Coordinates (for scroll actions)
// Overridden once the real resolution is known
// ===========================================
export const SCREEN_CENTER_X = 540;
export const SCREEN_CENTER_Y = 1200;

// Swipe coordinates: [start_x, start_y, end_x, end_y]
export type SwipeCoords = [number, number, number, number];
export type SwipeDirection = "up" | "down" | "left" | "right";

export const SWIPE_COORDS: Record<SwipeDirection, SwipeCoords> = {
  up: [SCREEN_CENTER_X, 1500, SCREEN_CENTER_X, 500],
  down: [SCREEN_CENTER_X, 500, SCREEN_CENTER_X, 1500],
  left: [800, SCREEN_CENTER_Y, 200, SCREEN_CENTER_Y],
  right: [200, SCREEN_CENTER_Y, 800, SCREEN_CENTER_Y],
};
export const SWIPE_DURATION_MS = 300;

/**
 * Scales the default swipe vectors to a detected resolution.
 * Vertical swipes travel the middle 60% of the height.
 */
export function computeSwipeCoords(width: number, height: number): Record<SwipeDirection, SwipeCoords> {
  const cx = Math.round(width / 2);
  const cy = Math.round(height / 2);
  const top = Math.round(height * 0.2);
  const bottom = Math.round(height * 0.8);
  const left = Math.round(width * 0.2);
  const right = Math.round(width * 0.8);
  return {
    up: [cx, bottom, cx, top],
    down: [cx, top, cx, bottom],
    left: [right, cy, left, cy],
    right: [left, cy, right, cy],
  };
}

// ===========================================
// Virtual Display
// ===========================================
export const DEFAULT_DISPLAY_NAME = "ZiZipVirtual";
/** Substring the display listing prints for any virtual display. */
export const VIRTUAL_DISPLAY_MARKER = "VirtualDisplay";
/** Id the OS usually hands the first virtual display. A guess, not a contract. */
export const DEFAULT_FALLBACK_DISPLAY_ID = 2;
export const DEFAULT_DISPLAY_DPI = 320;
export const DEFAULT_DISPLAY_WIDTH = 1080;
export const DEFAULT_DISPLAY_HEIGHT = 1920;
export const DEFAULT_READY_DELAY_MS = 500;
export const DEFAULT_RESOLVE_ATTEMPTS = 3;
export const RESOLVE_BACKOFF_MS = 250;

// ===========================================
// File Paths
// ===========================================
export const DEFAULT_SCREENSHOT_DIR = "/sdcard/Download";
export const DEVICE_DUMP_PATH = "/sdcard/window_dump.xml";

// ===========================================
// Input Method
// ===========================================
/** Broadcast action understood by ADBKeyboard-style input methods. */
export const IME_BROADCAST_ACTION = "ADB_INPUT_B64";
export const LAUNCHER_CATEGORY = "android.intent.category.LAUNCHER";

// ===========================================
// Agent Defaults
// ===========================================
export const DEFAULT_MAX_STEPS = 30;
export const DEFAULT_STEP_DELAY = 2.0;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_MAX_FAILURES = 3;
export const DEFAULT_STUCK_THRESHOLD = 3;
export const DEFAULT_MAX_ELEMENTS = 40;
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
export const DEFAULT_LOG_DIR = "logs";
export const MEMORY_LOG_CAPACITY = 500;

import type { ScreenshotFile } from "@sidescreen/shared";

/** The operations both the primary and the virtual display accept. */
export interface InputTarget {
  captureScreenshot(): Promise<ScreenshotFile | null>;
  tap(x: number, y: number): Promise<boolean>;
  swipe(x1: number, y1: number, x2: number, y2: number, durationMs?: number): Promise<boolean>;
  key(keyCode: number): Promise<boolean>;
  pressBack(): Promise<boolean>;
  pressHome(): Promise<boolean>;
}

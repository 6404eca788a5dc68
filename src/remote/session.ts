/**
 * Client for a display-streaming server that runs on the device.
 *
 * The server hosts its own virtual display, streams it as binary video
 * frames and takes line commands over one WebSocket:
 *
 *   out: CREATE_DISPLAY w h dpi [kbps] | TAP x y | SWIPE x1 y1 x2 y2 ms | KEY code
 *        TOUCH_DOWN|TOUCH_MOVE|TOUCH_UP x y | LAUNCH_APP pkg | SCREENSHOT | DESTROY_DISPLAY
 *   in:  DISPLAY_CREATED id | DISPLAY_SIZE w h | SCREENSHOT_DATA base64 | SCREENSHOT_ERROR ...
 */

import WebSocket from "ws";

import { SWIPE_DURATION_MS } from "../constants.js";
import type { Logger } from "../logger.js";

const TAG = "RemoteSession";
const STREAMING_WINDOW_MS = 2000;

/** What a UI needs from a remote display session. */
export interface RemoteSessionController {
  ensureConnected(): Promise<boolean>;
  getVideoSize(): [number, number];
  isVideoStreaming(): boolean;
  touchDown(x: number, y: number): boolean;
  touchMove(x: number, y: number): boolean;
  touchUp(x: number, y: number): boolean;
  requestScreenshot(timeoutMs?: number): Promise<Uint8Array | null>;
  shutdown(): void;
}

export interface WsRemoteSessionOptions {
  host?: string;
  port?: number;
  connectTimeoutMs?: number;
  logger: Logger;
  /** Clock used for the streaming window. */
  now?: () => number;
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

export class WsRemoteSession implements RemoteSessionController {
  private ws: WebSocket | null = null;
  private connected = false;
  private connecting: Promise<boolean> | null = null;
  private displayId: number | null = null;
  private videoWidth = 0;
  private videoHeight = 0;
  private lastFrameAt: number | null = null;
  private pendingScreenshot: ((bytes: Uint8Array | null) => void) | null = null;

  private readonly url: string;
  private readonly connectTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: WsRemoteSessionOptions) {
    this.url = `ws://${options.host ?? "127.0.0.1"}:${options.port ?? 8986}`;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  getDisplayId(): number | null {
    return this.displayId;
  }

  getVideoSize(): [number, number] {
    return [this.videoWidth, this.videoHeight];
  }

  isVideoStreaming(): boolean {
    return this.lastFrameAt !== null && this.now() - this.lastFrameAt < STREAMING_WINDOW_MS;
  }

  // ===========================================
  // Connection
  // ===========================================

  /** Connects once; concurrent callers share the attempt. */
  ensureConnected(): Promise<boolean> {
    if (this.connected && this.ws) return Promise.resolve(true);
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private connect(): Promise<boolean> {
    this.logger.debug(TAG, `Connecting to ${this.url}`);
    return new Promise((resolve) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      const timer = setTimeout(() => {
        this.logger.warn(TAG, `Connection to ${this.url} timed out`);
        ws.terminate();
        resolve(false);
      }, this.connectTimeoutMs);

      ws.on("open", () => {
        clearTimeout(timer);
        this.connected = true;
        this.logger.info(TAG, `Connected to ${this.url}`);
        resolve(true);
      });

      ws.on("message", (data, isBinary) => {
        if (isBinary) {
          this.lastFrameAt = this.now();
          return;
        }
        this.handleText(rawToString(data));
      });

      ws.on("close", (code) => {
        clearTimeout(timer);
        if (this.ws === ws) this.reset();
        this.logger.debug(TAG, `Connection closed (${code})`);
        resolve(false);
      });

      ws.on("error", (err) => {
        this.logger.warn(TAG, "WebSocket error", err);
      });
    });
  }

  private handleText(text: string): void {
    if (text.startsWith("DISPLAY_CREATED ")) {
      const id = Number.parseInt(text.slice("DISPLAY_CREATED ".length).trim(), 10);
      this.displayId = Number.isNaN(id) ? null : id;
      this.logger.info(TAG, `Remote display created: ${this.displayId ?? "unknown id"}`);
    } else if (text.startsWith("DISPLAY_SIZE ")) {
      const [w, h] = text.slice("DISPLAY_SIZE ".length).trim().split(/\s+/).map(Number);
      if (Number.isInteger(w) && Number.isInteger(h)) {
        this.videoWidth = w;
        this.videoHeight = h;
      }
    } else if (text.startsWith("SCREENSHOT_DATA ")) {
      const base64 = text.slice("SCREENSHOT_DATA ".length).trim();
      const bytes = Buffer.from(base64, "base64");
      this.settleScreenshot(bytes.length > 0 ? new Uint8Array(bytes) : null);
    } else if (text.startsWith("SCREENSHOT_ERROR")) {
      this.logger.error(TAG, `Screenshot error: ${text}`);
      this.settleScreenshot(null);
    } else {
      this.logger.debug(TAG, `[Server] ${text}`);
    }
  }

  // ===========================================
  // Commands
  // ===========================================

  async ensureDisplay(width: number, height: number, dpi: number, bitrateKbps?: number): Promise<boolean> {
    if (!(await this.ensureConnected())) return false;
    const parts = [width, height, dpi, ...(bitrateKbps === undefined ? [] : [bitrateKbps])].map(Math.round);
    return this.send(`CREATE_DISPLAY ${parts.join(" ")}`);
  }

  launchApp(packageName: string): boolean {
    return this.send(`LAUNCH_APP ${packageName}`);
  }

  tap(x: number, y: number): boolean {
    return this.send(`TAP ${Math.round(x)} ${Math.round(y)}`);
  }

  swipe(x1: number, y1: number, x2: number, y2: number, durationMs = SWIPE_DURATION_MS): boolean {
    const args = [x1, y1, x2, y2, durationMs].map(Math.round).join(" ");
    return this.send(`SWIPE ${args}`);
  }

  key(keyCode: number): boolean {
    return this.send(`KEY ${Math.round(keyCode)}`);
  }

  touchDown(x: number, y: number): boolean {
    return this.send(`TOUCH_DOWN ${Math.round(x)} ${Math.round(y)}`);
  }

  touchMove(x: number, y: number): boolean {
    return this.send(`TOUCH_MOVE ${Math.round(x)} ${Math.round(y)}`);
  }

  touchUp(x: number, y: number): boolean {
    return this.send(`TOUCH_UP ${Math.round(x)} ${Math.round(y)}`);
  }

  /** Resolves null on timeout, on a server error or when the connection drops. */
  async requestScreenshot(timeoutMs = 5000): Promise<Uint8Array | null> {
    if (!(await this.ensureConnected())) {
      this.logger.warn(TAG, "Not connected, cannot request a screenshot");
      return null;
    }

    this.settleScreenshot(null);
    const result = new Promise<Uint8Array | null>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn(TAG, `Screenshot timed out after ${timeoutMs}ms`);
        this.settleScreenshot(null);
      }, timeoutMs);
      this.pendingScreenshot = (bytes) => {
        clearTimeout(timer);
        resolve(bytes);
      };
    });

    if (!this.send("SCREENSHOT")) {
      this.settleScreenshot(null);
    }
    return result;
  }

  shutdown(): void {
    const ws = this.ws;
    if (ws && this.connected) {
      this.send("DESTROY_DISPLAY");
      ws.close(1000, "Client shutdown");
    }
    this.reset();
  }

  private settleScreenshot(bytes: Uint8Array | null): void {
    const pending = this.pendingScreenshot;
    this.pendingScreenshot = null;
    pending?.(bytes);
  }

  private reset(): void {
    this.ws = null;
    this.connected = false;
    this.displayId = null;
    this.lastFrameAt = null;
    this.settleScreenshot(null);
  }

  private send(command: string): boolean {
    const ws = this.ws;
    if (!ws || !this.connected || ws.readyState !== WebSocket.OPEN) {
      this.logger.warn(TAG, `Not connected, dropping ${command.split(" ")[0]}`);
      return false;
    }
    this.logger.debug(TAG, `send: ${command}`);
    ws.send(command);
    return true;
  }
}

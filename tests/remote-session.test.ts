import { once } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer, type WebSocket } from "ws";

import { MemoryLogger } from "../src/logger.js";
import { WsRemoteSession } from "../src/remote/session.js";

/** Stand-in for the on-device streaming server. */
class FakeDisplayServer {
  readonly received: string[] = [];
  readonly sockets: WebSocket[] = [];
  private readonly server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  respond: (command: string, socket: WebSocket) => void = () => {};

  constructor() {
    this.server.on("connection", (socket) => {
      this.sockets.push(socket);
      socket.on("message", (data) => {
        const command = data.toString();
        this.received.push(command);
        this.respond(command, socket);
      });
    });
  }

  async port(): Promise<number> {
    await once(this.server, "listening");
    const address = this.server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    return address.port;
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) socket.terminate();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }
}

let server: FakeDisplayServer;
let port: number;

beforeEach(async () => {
  server = new FakeDisplayServer();
  port = await server.port();
});

afterEach(async () => {
  await server.close();
});

function createSession(now?: () => number) {
  return new WsRemoteSession({ port, logger: new MemoryLogger(), connectTimeoutMs: 1000, ...(now ? { now } : {}) });
}

describe("WsRemoteSession", () => {
  it("creates a display and tracks what the server reports", async () => {
    server.respond = (command, socket) => {
      if (command.startsWith("CREATE_DISPLAY")) {
        socket.send("DISPLAY_CREATED 5");
        socket.send("DISPLAY_SIZE 720 1280");
      }
    };
    const session = createSession();

    expect(await session.ensureDisplay(720, 1280, 320, 4000)).toBe(true);

    await vi.waitFor(() => expect(session.getDisplayId()).toBe(5));
    await vi.waitFor(() => expect(session.getVideoSize()).toEqual([720, 1280]));
    expect(server.received).toEqual(["CREATE_DISPLAY 720 1280 320 4000"]);
    session.shutdown();
  });

  it("sends input as line commands", async () => {
    const session = createSession();
    await session.ensureConnected();

    expect(session.tap(10.4, 20)).toBe(true);
    expect(session.swipe(1, 2, 3, 4)).toBe(true);
    expect(session.key(4)).toBe(true);
    expect(session.touchDown(5, 6)).toBe(true);
    expect(session.touchMove(7, 8)).toBe(true);
    expect(session.touchUp(7, 8)).toBe(true);
    expect(session.launchApp("com.android.settings")).toBe(true);

    await vi.waitFor(() => expect(server.received).toHaveLength(7));
    expect(server.received).toEqual([
      "TAP 10 20",
      "SWIPE 1 2 3 4 300",
      "KEY 4",
      "TOUCH_DOWN 5 6",
      "TOUCH_MOVE 7 8",
      "TOUCH_UP 7 8",
      "LAUNCH_APP com.android.settings",
    ]);
    session.shutdown();
  });

  it("returns screenshot bytes", async () => {
    server.respond = (command, socket) => {
      if (command === "SCREENSHOT") socket.send(`SCREENSHOT_DATA ${Buffer.from([1, 2, 3]).toString("base64")}`);
    };
    const session = createSession();

    expect(await session.requestScreenshot(1000)).toEqual(new Uint8Array([1, 2, 3]));
    session.shutdown();
  });

  it("returns null on a screenshot error or timeout", async () => {
    server.respond = (command, socket) => {
      if (command === "SCREENSHOT" && server.received.length === 1) socket.send("SCREENSHOT_ERROR encoder busy");
    };
    const session = createSession();

    expect(await session.requestScreenshot(1000)).toBeNull();
    expect(await session.requestScreenshot(20)).toBeNull();
    session.shutdown();
  });

  it("counts binary frames as video for two seconds", async () => {
    let clock = 10_000;
    server.respond = (command, socket) => {
      if (command === "KEY 3") socket.send(Buffer.from([0, 0, 0, 1]));
    };
    const session = createSession(() => clock);
    await session.ensureConnected();
    expect(session.isVideoStreaming()).toBe(false);

    session.key(3);
    await vi.waitFor(() => expect(session.isVideoStreaming()).toBe(true));
    clock += 2500;
    expect(session.isVideoStreaming()).toBe(false);
    session.shutdown();
  });

  it("destroys the display on shutdown", async () => {
    const session = createSession();
    await session.ensureConnected();

    session.shutdown();

    await vi.waitFor(() => expect(server.received).toEqual(["DESTROY_DISPLAY"]));
    expect(session.isConnected).toBe(false);
    expect(session.tap(1, 1)).toBe(false);
  });

  it("reports false when nothing is listening", async () => {
    await server.close();
    const session = createSession();

    expect(await session.ensureConnected()).toBe(false);
    expect(await session.requestScreenshot(100)).toBeNull();
  });
});

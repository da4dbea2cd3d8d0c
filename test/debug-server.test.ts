import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { WebSocket, WebSocketServer } from "ws";
import { DebugServer } from "../src/debug/server.js";
import { createTaskGraphTemplate } from "../src/graph/template.js";
import { TaskRunner } from "../src/runtime/runner.js";
import { setLogSink } from "../src/utils/logger.js";
import { intValue } from "../src/values/task-value.js";

/** Buffers frames from the moment the socket is created. */
class TestClient {
  private frames: unknown[] = [];
  private waiters: Array<(frame: unknown) => void> = [];

  constructor(readonly ws: WebSocket) {
    ws.on("message", (raw) => {
      const frame: unknown = JSON.parse(raw.toString());
      const waiter = this.waiters.shift();
      if (waiter) waiter(frame);
      else this.frames.push(frame);
    });
  }

  static async open(url: string): Promise<TestClient> {
    const client = new TestClient(new WebSocket(url));
    await new Promise<void>((resolve, reject) => {
      client.ws.once("open", () => resolve());
      client.ws.once("error", reject);
    });
    return client;
  }

  next(): Promise<unknown> {
    if (this.frames.length > 0) return Promise.resolve(this.frames.shift());
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(): void {
    this.ws.close();
  }
}

const template = createTaskGraphTemplate({
  name: "sentry",
  rootNodeId: 0,
  variables: [{ name: "Count", type: "Int", defaultValue: intValue(0) }],
  nodes: [{ id: 0, kind: "AtomicTask", atomicTaskId: "Wait" }],
});
const runner = new TaskRunner(9n, template);

let server: DebugServer;
let url: string;
let client: TestClient | undefined;

beforeAll(async () => {
  setLogSink(() => {});
  server = new DebugServer({ port: 0, host: "127.0.0.1", runners: () => [runner] });
  const addr = await server.start();
  url = `ws://${addr.host}:${addr.port}`;
});

afterEach(() => {
  client?.close();
  client = undefined;
});

afterAll(async () => {
  await server.stop();
  setLogSink(null);
});

const runnerState = {
  entity: "9",
  template: "sentry",
  nodeId: 0,
  stateTimer: 0,
  lastStatus: null,
  blackboard: { Count: { type: "Int", value: 0 } },
};

describe("DebugServer", () => {
  it("greets a new client with the runner list", async () => {
    client = await TestClient.open(url);
    expect(await client.next()).toEqual({ type: "hello", runners: [runnerState] });
  });

  it("answers ping and runner requests", async () => {
    client = await TestClient.open(url);
    await client.next();

    client.ws.send(JSON.stringify({ type: "ping" }));
    expect(await client.next()).toEqual({ type: "pong" });

    client.ws.send(JSON.stringify({ type: "runners" }));
    expect(await client.next()).toEqual({ type: "runners", runners: [runnerState] });
  });

  it("reports malformed messages", async () => {
    client = await TestClient.open(url);
    await client.next();

    client.ws.send("not json");
    expect(await client.next()).toEqual({ type: "error", error: "Invalid JSON" });

    client.ws.send(JSON.stringify({ type: "shutdown" }));
    expect(await client.next()).toMatchObject({ type: "error" });
  });

  it("broadcasts executor steps", async () => {
    client = await TestClient.open(url);
    await client.next();

    server.observer({ entity: 9n, nodeId: 0, status: "Running", blackboard: { Count: intValue(3) } });

    expect(await client.next()).toEqual({
      type: "step",
      entity: "9",
      nodeId: 0,
      status: "Running",
      blackboard: { Count: { type: "Int", value: 3 } },
    });
  });

  it("rejects start when the port is taken", async () => {
    const clash = new DebugServer({ port: Number(new URL(url).port), host: "127.0.0.1" });
    await expect(clash.start()).rejects.toThrow();
    expect(clash.clientCount).toBe(0);
    await clash.stop();
  });

  it("logs server errors raised after it started listening", async () => {
    const warnings: string[] = [];
    setLogSink((level, line) => {
      if (level === "warn") warnings.push(line);
    });
    const address = vi.spyOn(WebSocketServer.prototype, "address");
    const extra = new DebugServer({ port: 0, host: "127.0.0.1" });
    try {
      await extra.start();
      const wss = address.mock.contexts[0];
      expect(wss).toBeInstanceOf(WebSocketServer);
      if (!(wss instanceof WebSocketServer)) return;

      wss.emit("error", new Error("first"));
      wss.emit("error", new Error("second"));

      expect(warnings.map((l) => l.slice(l.indexOf("[DebugServer]")))).toEqual([
        '[DebugServer] Server error {"error":"first"}',
        '[DebugServer] Server error {"error":"second"}',
      ]);
    } finally {
      address.mockRestore();
      await extra.stop();
      setLogSink(() => {});
    }
  });

  it("counts connected clients", async () => {
    client = await TestClient.open(url);
    await client.next();
    expect(server.clientCount).toBeGreaterThanOrEqual(1);
  });
});

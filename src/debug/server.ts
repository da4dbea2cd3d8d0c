import { WebSocketServer, WebSocket, type RawData } from "ws";
import { getConfig } from "../config.js";
import type { ExecutorObserver, ExecutorStep } from "../executor/types.js";
import type { TaskRunner } from "../runtime/runner.js";
import { DebugClientMessageSchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { toPlainValue, type PlainValue, type TaskValue, type VariableType } from "../values/task-value.js";

const log = createLogger("DebugServer");

export type PlainVariable = { type: VariableType; value: PlainValue };

export type RunnerState = {
  entity: string;
  template: string;
  nodeId: number;
  stateTimer: number;
  lastStatus: string | null;
  blackboard: Record<string, PlainVariable>;
};

export type DebugFrame =
  | { type: "hello"; runners: RunnerState[] }
  | { type: "step"; entity: string; nodeId: number; status: ExecutorStep["status"]; blackboard: Record<string, PlainVariable> }
  | { type: "runners"; runners: RunnerState[] }
  | { type: "pong" }
  | { type: "error"; error: string };

export type DebugServerOptions = {
  port?: number;
  host?: string;
  /** Source of the runner list sent on connect and on request. */
  runners?: () => Iterable<TaskRunner>;
};

function plainBlackboard(values: Readonly<Record<string, TaskValue>>): Record<string, PlainVariable> {
  const out: Record<string, PlainVariable> = {};
  for (const [name, value] of Object.entries(values)) {
    out[name] = toPlainValue(value);
  }
  return out;
}

export function describeRunner(runner: TaskRunner): RunnerState {
  return {
    entity: runner.entity.toString(),
    template: runner.template.name,
    nodeId: runner.currentNodeId,
    stateTimer: runner.stateTimer,
    lastStatus: runner.lastStatus,
    blackboard: plainBlackboard(runner.blackboard.snapshot()),
  };
}

/**
 * Streams executor steps to WebSocket clients as JSON frames. Attach
 * `observer` to a TaskExecutor (or TaskSystem) to feed it.
 */
export class DebugServer {
  private port: number;
  private host: string;
  private wss: WebSocketServer | null = null;
  private runnerSource?: () => Iterable<TaskRunner>;

  constructor(opts: DebugServerOptions = {}) {
    this.port = opts.port ?? getConfig().debug.port;
    this.host = opts.host ?? getConfig().debug.host;
    this.runnerSource = opts.runners;
  }

  readonly observer: ExecutorObserver = (step) => this.publish(step);

  get clientCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  async start(): Promise<{ port: number; host: string }> {
    const wss = new WebSocketServer({ port: this.port, host: this.host });
    this.wss = wss;

    wss.on("connection", (ws) => {
      log.debug("Client connected", { clients: wss.clients.size });
      this.send(ws, { type: "hello", runners: this.runnerStates() });
      ws.on("message", (raw) => this.handleMessage(ws, raw));
      ws.on("error", (err) => log.warn("Client socket error", { error: err.message }));
    });

    return new Promise((resolve, reject) => {
      const onStartupError = (err: Error): void => {
        this.wss = null;
        reject(err);
      };
      wss.once("error", onStartupError);
      wss.once("listening", () => {
        wss.off("error", onStartupError);
        wss.on("error", (err) => log.warn("Server error", { error: err.message }));
        const addr = wss.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Debug stream at ws://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  /** Broadcast one executor step to every open client. */
  publish(step: ExecutorStep): void {
    if (!this.wss || this.wss.clients.size === 0) return;
    const frame: DebugFrame = {
      type: "step",
      entity: step.entity.toString(),
      nodeId: step.nodeId,
      status: step.status,
      blackboard: plainBlackboard(step.blackboard),
    };
    const data = JSON.stringify(frame);
    for (const client of this.wss.clients) {
      if (client.readyState === WebSocket.OPEN) client.send(data);
    }
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;
    this.wss = null;
    for (const client of wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private handleMessage(ws: WebSocket, raw: RawData): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString());
    } catch {
      this.send(ws, { type: "error", error: "Invalid JSON" });
      return;
    }

    const result = DebugClientMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.send(ws, { type: "error", error: result.error.issues.map((i) => i.message).join("; ") });
      return;
    }

    switch (result.data.type) {
      case "ping":
        this.send(ws, { type: "pong" });
        break;
      case "runners":
        this.send(ws, { type: "runners", runners: this.runnerStates() });
        break;
    }
  }

  private runnerStates(): RunnerState[] {
    return this.runnerSource ? [...this.runnerSource()].map(describeRunner) : [];
  }

  private send(ws: WebSocket, frame: DebugFrame): void {
    if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify(frame));
  }
}

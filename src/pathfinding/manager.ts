import { createLogger } from "../utils/logger.js";
import { formatVector, type Vector3 } from "../values/vector.js";

const log = createLogger("PathfindingManager");

export type RequestId = number;

export const INVALID_REQUEST_ID: RequestId = 0;

type RequestEntry = {
  start: Vector3;
  target: Vector3;
  result: string;
  completed: boolean;
  timer?: ReturnType<typeof setTimeout>;
};

/**
 * Async path requests that tasks poll from tick to tick.
 *
 * Results are straight-line waypoint strings `"(sx,sy,sz)->(tx,ty,tz)"`;
 * navigation itself is the host's concern. A request with no delay
 * completes before `request()` returns; otherwise a timer completes it.
 */
export class PathfindingManager {
  private requests = new Map<RequestId, RequestEntry>();
  private nextId: RequestId = 1;

  request(start: Vector3, target: Vector3, delaySeconds = 0): RequestId {
    const id = this.nextId++;
    const entry: RequestEntry = { start, target, result: "", completed: false };
    this.requests.set(id, entry);

    log.debug(`Submitted request ${id}`, {
      start: formatVector(start),
      target: formatVector(target),
      delaySeconds,
    });

    if (delaySeconds > 0) {
      entry.timer = setTimeout(() => this.complete(id), delaySeconds * 1000);
    } else {
      this.complete(id);
    }
    return id;
  }

  /** False for unknown, cancelled or still pending requests. */
  isComplete(id: RequestId): boolean {
    return this.requests.get(id)?.completed ?? false;
  }

  /** Empty until the request has completed. */
  getPathString(id: RequestId): string {
    const entry = this.requests.get(id);
    return entry?.completed ? entry.result : "";
  }

  /** Drop a request, pending or finished. Unknown ids are ignored. */
  cancel(id: RequestId): void {
    const entry = this.requests.get(id);
    if (!entry) return;
    if (entry.timer) clearTimeout(entry.timer);
    this.requests.delete(id);
    log.debug(`Request ${id} released`);
  }

  get pendingCount(): number {
    let n = 0;
    for (const entry of this.requests.values()) {
      if (!entry.completed) n++;
    }
    return n;
  }

  /** Cancel everything and stop all timers. */
  dispose(): void {
    for (const id of [...this.requests.keys()]) {
      this.cancel(id);
    }
  }

  private complete(id: RequestId): void {
    const entry = this.requests.get(id);
    if (!entry) return;
    entry.timer = undefined;
    entry.result = `${formatVector(entry.start)}->${formatVector(entry.target)}`;
    entry.completed = true;
    log.debug(`Request ${id} completed`, { path: entry.result });
  }
}

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { RUNNER_STATUSES, type RunnerSnapshot, type RunnerStatus } from "../runtime/runner.js";
import type { EntityId } from "../values/task-value.js";

export type StoredSnapshot = RunnerSnapshot & {
  savedAt: number;
};

/** Runner snapshots keyed by entity, one row each. */
export class SnapshotStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().persistence.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
      this.db = new Database(path);
      this.db.pragma("journal_mode = WAL");
    } else {
      this.db = new Database(path);
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runner_snapshots (
        entity        TEXT PRIMARY KEY,
        template_name TEXT NOT NULL,
        node_id       INTEGER NOT NULL,
        state_timer   REAL NOT NULL DEFAULT 0,
        last_status   TEXT,
        blackboard    BLOB NOT NULL,
        saved_at      INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_snapshots_saved ON runner_snapshots(saved_at DESC);
    `);
  }

  save(snapshot: RunnerSnapshot, savedAt = Date.now()): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runner_snapshots
        (entity, template_name, node_id, state_timer, last_status, blackboard, saved_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      snapshot.entity.toString(),
      snapshot.templateName,
      snapshot.nodeId,
      snapshot.stateTimer,
      snapshot.lastStatus,
      snapshot.blackboard,
      savedAt,
    );
  }

  /** Save several snapshots in one transaction. */
  saveMany(snapshots: readonly RunnerSnapshot[], savedAt = Date.now()): number {
    const tx = this.db.transaction((items: readonly RunnerSnapshot[]) => {
      for (const s of items) this.save(s, savedAt);
      return items.length;
    });
    return tx(snapshots);
  }

  get(entity: EntityId): StoredSnapshot | undefined {
    const row = this.db
      .prepare("SELECT * FROM runner_snapshots WHERE entity = ?")
      .get(entity.toString()) as SnapshotRow | undefined;
    return row ? rowToSnapshot(row) : undefined;
  }

  /** Most recently saved first. */
  list(limit = 100): StoredSnapshot[] {
    const rows = this.db
      .prepare("SELECT * FROM runner_snapshots ORDER BY saved_at DESC, entity ASC LIMIT ?")
      .all(limit) as SnapshotRow[];
    return rows.map(rowToSnapshot);
  }

  delete(entity: EntityId): boolean {
    const result = this.db.prepare("DELETE FROM runner_snapshots WHERE entity = ?").run(entity.toString());
    return result.changes > 0;
  }

  deleteAll(): number {
    return this.db.prepare("DELETE FROM runner_snapshots").run().changes;
  }

  close(): void {
    this.db.close();
  }
}

type SnapshotRow = {
  entity: string;
  template_name: string;
  node_id: number;
  state_timer: number;
  last_status: string | null;
  blackboard: Buffer;
  saved_at: number;
};

function parseStatus(value: string | null): RunnerStatus | null {
  return RUNNER_STATUSES.find((s) => s === value) ?? null;
}

function rowToSnapshot(row: SnapshotRow): StoredSnapshot {
  return {
    entity: BigInt(row.entity),
    templateName: row.template_name,
    nodeId: row.node_id,
    stateTimer: row.state_timer,
    lastStatus: parseStatus(row.last_status),
    blackboard: row.blackboard,
    savedAt: row.saved_at,
  };
}

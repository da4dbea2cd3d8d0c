#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { getConfig } from "./config.js";
import { DebugServer } from "./debug/server.js";
import { ValidationError, errorMessage } from "./errors.js";
import { loadTemplateFromFile } from "./graph/loader.js";
import type { TaskGraphTemplate } from "./graph/template.js";
import { SnapshotStore } from "./persistence/store.js";
import type { TaskRunner } from "./runtime/runner.js";
import { TaskSystem } from "./task-system.js";
import { setLogLevel } from "./utils/logger.js";
import { formatValue } from "./values/task-value.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("atomic-tasks")
  .description("Run and inspect per-entity atomic task graphs")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Expected a positive number.");
  return n;
}

function portNumber(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 65535) throw new InvalidArgumentError("Expected a port number.");
  return n;
}

/** Load a graph, printing loader warnings. Sets a failing exit code and returns undefined on error. */
function loadOrReport(path: string): TaskGraphTemplate | undefined {
  try {
    const { template, warnings } = loadTemplateFromFile(path);
    for (const w of warnings) console.warn(`warning: ${w}`);
    return template;
  } catch (err) {
    console.error(`Cannot load ${path}: ${errorMessage(err)}`);
    if (err instanceof ValidationError) {
      for (const p of err.problems) console.error(`  - ${p}`);
    }
    process.exitCode = 1;
    return undefined;
  }
}

function printRunner(runner: TaskRunner): void {
  console.log(`entity ${runner.entity}: ${runner.lastStatus ?? "(never ran)"} at node ${runner.currentNodeId}`);
  for (const [name, value] of Object.entries(runner.blackboard.snapshot())) {
    console.log(`  ${name} = ${formatValue(value)}`);
  }
}

type RunCommandOptions = {
  entities: number;
  dt: number;
  maxTicks: number;
  serve?: number | true;
  snapshotDb?: string;
};

// --- run ---
program
  .command("run")
  .description("Run a task graph for one or more entities until they finish")
  .argument("<graph>", "Task graph JSON file")
  .option("-e, --entities <n>", "Number of entities to spawn", positiveInt, 1)
  .option("--dt <seconds>", "Seconds per tick", positiveNumber, getConfig().tick.deltaTime)
  .option("--max-ticks <n>", "Stop after this many ticks", positiveInt, getConfig().tick.maxTicks)
  .option("--serve [port]", "Stream executor steps over WebSocket while running", portNumber)
  .option("--snapshot-db <path>", "Save final runner state to this SQLite file")
  .action(async (graph: string, opts: RunCommandOptions) => {
    const template = loadOrReport(graph);
    if (!template) return;

    const system = new TaskSystem();
    for (let i = 1; i <= opts.entities; i++) {
      system.spawn(BigInt(i), template);
    }

    let server: DebugServer | undefined;
    if (opts.serve !== undefined) {
      server = new DebugServer({
        port: opts.serve === true ? getConfig().debug.port : opts.serve,
        runners: () => system.runners(),
      });
      const addr = await server.start();
      system.setObserver(server.observer);
      console.log(`Debug stream: ws://${addr.host}:${addr.port}`);
    }

    try {
      const summary = server
        ? await runPaced(system, opts.dt, opts.maxTicks)
        : system.runUntilIdle({ deltaTime: opts.dt, maxTicks: opts.maxTicks });

      console.log(`${summary.idle ? "Finished" : "Stopped"} after ${summary.ticks} ticks`);
      for (const runner of system.runners()) printRunner(runner);

      if (opts.snapshotDb) {
        const store = new SnapshotStore(opts.snapshotDb);
        try {
          const saved = system.saveSnapshots(store);
          console.log(`Saved ${saved} snapshot(s) to ${opts.snapshotDb}`);
        } finally {
          store.close();
        }
      }
      if (!summary.idle) process.exitCode = 2;
    } finally {
      system.shutdown();
      await server?.stop();
    }
  });

/** Tick in real time so debug clients can follow along. */
async function runPaced(system: TaskSystem, dt: number, maxTicks: number): Promise<{ ticks: number; idle: boolean }> {
  let ticks = 0;
  while (ticks < maxTicks && !system.isIdle()) {
    system.tick(dt);
    ticks++;
    await new Promise((r) => setTimeout(r, dt * 1000));
  }
  return { ticks, idle: system.isIdle() };
}

// --- validate ---
program
  .command("validate")
  .description("Check a task graph file without running it")
  .argument("<graph>", "Task graph JSON file")
  .action((graph: string) => {
    const template = loadOrReport(graph);
    if (!template) return;
    console.log(
      `OK: "${template.name}" (${template.nodes.length} nodes, ${template.variables.length} variables, root ${template.rootNodeId})`,
    );
  });

// --- tasks ---
program
  .command("tasks")
  .description("List registered atomic task ids")
  .action(() => {
    const system = new TaskSystem();
    for (const id of system.registry.getAllTaskIds()) console.log(id);
    system.shutdown();
  });

// --- snapshots ---
program
  .command("snapshots")
  .description("List runner snapshots stored in a SQLite file")
  .argument("<db>", "Snapshot database path")
  .option("-l, --limit <n>", "Maximum rows", positiveInt, 50)
  .action((db: string, opts: { limit: number }) => {
    const store = new SnapshotStore(db);
    try {
      const rows = store.list(opts.limit);
      if (rows.length === 0) {
        console.log("No snapshots.");
        return;
      }
      for (const s of rows) {
        console.log(
          `entity ${s.entity}  ${s.templateName}  node ${s.nodeId}  ${s.lastStatus ?? "-"}  ` +
            `${s.blackboard.length} bytes  ${new Date(s.savedAt).toISOString()}`,
        );
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});

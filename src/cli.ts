#!/usr/bin/env node

import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import type { Agent } from "./agents/adapter.js";
import { AgentRegistry } from "./agents/registry.js";
import { RoleAgent } from "./agents/role-agent.js";
import { AGENT_ROLES, isAgentRole } from "./agents/roles.js";
import type { RunConfigInput } from "./config.js";
import { ConfigError, describeError, ParseError } from "./errors.js";
import { HttpModelClient } from "./gateway/http-client.js";
import { Orchestrator, type RunReport } from "./orchestrator.js";
import { RunStore } from "./persistence/store.js";
import { Planner } from "./planner/planner.js";
import { TaskGraph } from "./planner/task-graph.js";
import { GraphFileSchema, parseOrThrow, type GraphFile } from "./schemas.js";
import { log, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { error: describeError(reason) });
});

const DEFAULT_MODEL_URL = process.env.ORCH_MODEL_URL ?? "http://localhost:11434";
const DEFAULT_MODEL = process.env.ORCH_MODEL ?? "llama3:8b";

type ModelOpts = {
  modelUrl: string;
  model: string;
  embeddingModel?: string;
  roles: string[];
  copies: number;
};

type RunCommandOpts = ModelOpts & {
  concurrency?: number;
  faultTolerance?: number | "none";
  maxRetries?: number;
  consensusTimeout?: number;
  db?: string;
  json?: boolean;
};

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function parseFaultTolerance(value: string): number | "none" {
  return value === "none" ? "none" : parseInteger(value);
}

async function loadGraphFile(path: string): Promise<GraphFile> {
  const raw = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ParseError(`${path} is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  return parseOrThrow(GraphFileSchema, data, `graph file ${path}`);
}

/** One role agent per (role, copy) pair, all sharing a model client. */
function buildAgents(opts: ModelOpts, timeout?: number): Agent[] {
  const client = new HttpModelClient({
    baseUrl: opts.modelUrl,
    model: opts.model,
    embeddingModel: opts.embeddingModel,
  });
  const agents: Agent[] = [];
  for (const role of opts.roles) {
    if (!isAgentRole(role)) {
      throw new ConfigError(`Unknown role "${role}" (expected one of ${AGENT_ROLES.join(", ")})`);
    }
    for (let i = 1; i <= opts.copies; i++) {
      agents.push(
        new RoleAgent({
          name: opts.copies > 1 ? `${role}-${i}` : role,
          role,
          client,
          useEmbeddings: Boolean(opts.embeddingModel),
          timeout,
        }),
      );
    }
  }
  return agents;
}

function printReport(report: RunReport): void {
  console.log(`\n--- Run ${report.runId} ---`);
  for (const task of report.tasks) {
    const output =
      task.result === undefined
        ? `${task.failure?.reason ?? "failed"}: ${task.failure?.detail ?? ""}`
        : typeof task.result.payload === "string"
          ? task.result.payload
          : JSON.stringify(task.result.payload);
    const retries = task.retryCount > 0 ? ` (${task.retryCount} retries)` : "";
    console.log(`  [${task.status}] ${task.id}${retries}: ${output.slice(0, 200)}`);
  }
  const state = report.cancelled ? "cancelled" : report.success ? "succeeded" : "finished with failures";
  console.log(
    `\n${state} in ${report.durationMs}ms (${report.counts.succeeded} succeeded, ${report.counts.failed} failed)`,
  );
}

function addModelOptions(cmd: Command): Command {
  return cmd
    .option("--model-url <url>", "Ollama-compatible model server", DEFAULT_MODEL_URL)
    .option("-m, --model <name>", "Model name", DEFAULT_MODEL)
    .option("--embedding-model <name>", "Embed answers with this model for similarity voting")
    .option("-r, --roles <roles...>", "Agent roles to create", ["analyst", "coder", "reviewer"])
    .option("--copies <n>", "Agents per role", parseInteger, 1);
}

const program = new Command();

program
  .name("quorum-orchestrator")
  .description("Run dependency-ordered agent tasks with quorum consensus")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

// --- run ---
addModelOptions(
  program
    .command("run")
    .description("Run a task graph file")
    .argument("<graph>", "Path to a JSON graph file ({ tasks, config? })")
    .option("-c, --concurrency <n>", "Max parallel tasks", parseInteger)
    .option("-f, --fault-tolerance <f>", 'Fault parameter f, or "none" for single-agent', parseFaultTolerance)
    .option("--max-retries <n>", "Retries per task after the first attempt", parseInteger)
    .option("--consensus-timeout <ms>", "Answer collection window per round", parseInteger)
    .option("--db <path>", "Record results and the report in this SQLite file")
    .option("--json", "Print the report as JSON"),
).action(async (graphPath: string, opts: RunCommandOpts) => {
  const file = await loadGraphFile(graphPath);
  const graph = TaskGraph.fromTasks(file.tasks);

  const overrides: RunConfigInput = {
    concurrency: opts.concurrency,
    maxRetries: opts.maxRetries,
    consensusTimeoutMs: opts.consensusTimeout,
  };
  if (opts.faultTolerance !== undefined) {
    overrides.defaultFaultTolerance = opts.faultTolerance === "none" ? null : opts.faultTolerance;
  }

  const orch = new Orchestrator({ config: file.config });
  for (const agent of buildAgents(opts, file.config?.agentTimeoutMs)) orch.addAgent(agent);

  const store = opts.db ? new RunStore(opts.db) : undefined;
  const runId = randomUUID();
  const controller = new AbortController();
  const onSigint = () => {
    console.error("\nCancelling run...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await orch.run(graph, {
      config: overrides,
      runId,
      signal: controller.signal,
      sink: store?.sinkFor(runId),
    });
    store?.saveReport(report);
    if (opts.json) console.log(JSON.stringify(report, null, 2));
    else printReport(report);
    if (!report.success) process.exitCode = 1;
  } finally {
    process.off("SIGINT", onSigint);
    store?.close();
  }
});

// --- validate ---
program
  .command("validate")
  .description("Check a graph file and print its tasks in dependency order")
  .argument("<graph>", "Path to a JSON graph file")
  .action(async (graphPath: string) => {
    const file = await loadGraphFile(graphPath);
    const graph = TaskGraph.fromTasks(file.tasks);
    for (const task of graph.topologicalOrder()) {
      const deps = task.dependsOn.length > 0 ? ` <- ${task.dependsOn.join(", ")}` : "";
      console.log(`${task.id} (priority ${task.priority})${deps}`);
    }
  });

// --- plan ---
addModelOptions(
  program
    .command("plan")
    .description("Decompose a goal into a graph file printed to stdout")
    .argument("<goal>", "The goal to decompose")
    .option("-a, --assign-to <agent>", "Agent name or role for the generated tasks"),
).action(async (goal: string, opts: ModelOpts & { assignTo?: string }) => {
  const [agent] = buildAgents({ ...opts, roles: ["planner"], copies: 1 });
  const graph = await new Planner({ agent, assignTo: opts.assignTo }).plan(goal);
  const tasks = graph.topologicalOrder().map((t) => ({
    id: t.id,
    spec: t.spec,
    priority: t.priority,
    dependsOn: t.dependsOn,
  }));
  console.log(JSON.stringify({ tasks }, null, 2));
});

// --- health ---
addModelOptions(program.command("health").description("Check that every agent can reach its model")).action(
  async (opts: ModelOpts) => {
    const registry = new AgentRegistry();
    for (const agent of buildAgents(opts)) registry.add(agent);
    const results = await registry.checkAllHealth();
    for (const h of results) {
      const detail = h.error ? ` (${h.error})` : "";
      console.log(`  ${h.healthy ? "ok  " : "DOWN"} ${h.name} ${h.responseTimeMs ?? 0}ms${detail}`);
    }
    if (results.some((h) => !h.healthy)) process.exitCode = 1;
  },
);

// --- history ---
program
  .command("history")
  .description("List recorded runs")
  .requiredOption("--db <path>", "SQLite file written by `run --db`")
  .option("-n, --limit <n>", "Number of runs", parseInteger, 10)
  .action((opts: { db: string; limit: number }) => {
    const store = new RunStore(opts.db);
    try {
      for (const report of store.listReports(opts.limit)) {
        const state = report.cancelled ? "cancelled" : report.success ? "ok" : "failed";
        console.log(
          `${new Date(report.startedAt).toISOString()}  ${report.runId}  ${state}  ` +
            `${report.counts.succeeded}/${report.tasks.length} succeeded  ${report.durationMs}ms`,
        );
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(describeError(err));
  process.exit(1);
});

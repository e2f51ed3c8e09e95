import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import type { RunReport } from "../orchestrator.js";
import type { TaskResult } from "../planner/types.js";
import { JsonValueSchema, RunReportSchema, parseOrThrow } from "../schemas.js";
import type { ResultSink } from "../sink/result-sink.js";
import { z } from "zod";

const DEFAULT_DB_DIR = join(homedir(), ".quorum-orchestrator");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "runs.db");

const StoredPayloadSchema = z.union([z.string(), z.record(JsonValueSchema), z.array(JsonValueSchema)]);

export type StoredTaskResult = {
  runId: string;
  taskId: string;
  result: TaskResult;
  acceptedAt: number;
};

/** SQLite store for run reports and the task results delivered during runs. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        success     INTEGER NOT NULL,
        cancelled   INTEGER NOT NULL,
        succeeded   INTEGER NOT NULL,
        failed      INTEGER NOT NULL,
        report      TEXT NOT NULL,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);

      CREATE TABLE IF NOT EXISTS task_results (
        run_id      TEXT NOT NULL,
        task_id     TEXT NOT NULL,
        payload     TEXT NOT NULL,
        produced_by TEXT NOT NULL,
        support     INTEGER NOT NULL,
        accepted_at INTEGER NOT NULL,
        PRIMARY KEY (run_id, task_id)
      );
    `);
  }

  /** Sink that records each accepted result of run `runId`. */
  sinkFor(runId: string): ResultSink {
    return {
      accept: (taskId, result) => this.saveResult(runId, taskId, result),
    };
  }

  saveResult(runId: string, taskId: string, result: TaskResult): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO task_results (run_id, task_id, payload, produced_by, support, accepted_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      runId,
      taskId,
      JSON.stringify(result.payload),
      JSON.stringify(result.producedBy),
      result.support,
      Date.now(),
    );
  }

  results(runId: string): StoredTaskResult[] {
    const rows = this.db
      .prepare("SELECT * FROM task_results WHERE run_id = ? ORDER BY accepted_at, task_id")
      .all(runId);
    return parseOrThrow(z.array(ResultRowSchema), rows, "task_results rows").map(rowToResult);
  }

  saveReport(report: RunReport): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, success, cancelled, succeeded, failed, report, started_at, finished_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      report.runId,
      report.success ? 1 : 0,
      report.cancelled ? 1 : 0,
      report.counts.succeeded,
      report.counts.failed,
      JSON.stringify(report),
      report.startedAt,
      report.finishedAt,
    );
  }

  getReport(runId: string): RunReport | undefined {
    const row = this.db.prepare("SELECT report FROM runs WHERE run_id = ?").get(runId);
    return row === undefined ? undefined : parseReport(parseOrThrow(ReportRowSchema, row, "runs row").report);
  }

  listReports(limit = 50): RunReport[] {
    const rows = this.db.prepare("SELECT report FROM runs ORDER BY started_at DESC LIMIT ?").all(limit);
    return parseOrThrow(z.array(ReportRowSchema), rows, "runs rows").map((r) => parseReport(r.report));
  }

  /** Delete a run and its results. Returns true if the run existed. */
  delete(runId: string): boolean {
    this.db.prepare("DELETE FROM task_results WHERE run_id = ?").run(runId);
    return this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId).changes > 0;
  }

  /** Delete runs started before `timestamp`. Returns the number deleted. */
  deleteOlderThan(timestamp: number): number {
    const purge = this.db.transaction((before: number) => {
      this.db
        .prepare("DELETE FROM task_results WHERE run_id IN (SELECT run_id FROM runs WHERE started_at < ?)")
        .run(before);
      return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(before).changes;
    });
    return purge(timestamp);
  }

  close(): void {
    this.db.close();
  }
}

const ResultRowSchema = z.object({
  run_id: z.string(),
  task_id: z.string(),
  payload: z.string(),
  produced_by: z.string(),
  support: z.number(),
  accepted_at: z.number(),
});

type ResultRow = z.infer<typeof ResultRowSchema>;

const ReportRowSchema = z.object({ report: z.string() });

function parseReport(raw: string): RunReport {
  return parseOrThrow(RunReportSchema, JSON.parse(raw), "stored run report");
}

function rowToResult(row: ResultRow): StoredTaskResult {
  return {
    runId: row.run_id,
    taskId: row.task_id,
    result: {
      payload: parseOrThrow(StoredPayloadSchema, JSON.parse(row.payload), "stored payload"),
      producedBy: parseOrThrow(z.array(z.string()), JSON.parse(row.produced_by), "stored agents"),
      support: row.support,
    },
    acceptedAt: row.accepted_at,
  };
}

import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import type { CallRecord, CallStatus } from "../contracts/problem";
import { CALL_STATUSES } from "../contracts/problem";
import { type CallRecordStore, DuplicateCallRecordError } from "./call_record_store";

type CallRecordRow = {
  run_id: string;
  seq: number;
  problem_id: string;
  status: string;
  answer: number;
  raw_answer: number | null;
  raw_error: string | null;
  started_at: string;
  deadline_at: string;
  finished_at: string;
  elapsed_ms: number;
};

const isCallStatus = (value: string): value is CallStatus =>
  CALL_STATUSES.some((status) => status === value);

export class SqliteCallRecordStore implements CallRecordStore {
  private db: Database.Database;

  constructor(dbPath: string = "./data/call_records.db") {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS call_records (
        run_id TEXT NOT NULL,
        seq INTEGER NOT NULL,
        problem_id TEXT NOT NULL,
        status TEXT NOT NULL,
        answer INTEGER NOT NULL,
        raw_answer INTEGER,
        raw_error TEXT,
        started_at TEXT NOT NULL,
        deadline_at TEXT NOT NULL,
        finished_at TEXT NOT NULL,
        elapsed_ms INTEGER NOT NULL,
        PRIMARY KEY (run_id, problem_id)
      );

      CREATE INDEX IF NOT EXISTS idx_call_records_run_seq ON call_records(run_id, seq);
    `);
  }

  async append(record: CallRecord): Promise<void> {
    try {
      this.db
        .prepare(
          `INSERT INTO call_records (
            run_id, seq, problem_id, status, answer, raw_answer, raw_error,
            started_at, deadline_at, finished_at, elapsed_ms
          ) VALUES (
            @run_id, @seq, @problem_id, @status, @answer, @raw_answer, @raw_error,
            @started_at, @deadline_at, @finished_at, @elapsed_ms
          )`
        )
        .run({
          run_id: record.runId,
          seq: record.seq,
          problem_id: record.problemId,
          status: record.status,
          answer: record.answer,
          raw_answer: record.rawAnswer,
          raw_error: record.rawError,
          started_at: record.startedAt,
          deadline_at: record.deadlineAt,
          finished_at: record.finishedAt,
          elapsed_ms: record.elapsedMs,
        } satisfies CallRecordRow);
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_PRIMARYKEY") {
        throw new DuplicateCallRecordError(record.runId, record.problemId);
      }
      throw error;
    }
  }

  async listRun(runId: string): Promise<CallRecord[]> {
    const rows = this.db
      .prepare<[string], CallRecordRow>(
        "SELECT * FROM call_records WHERE run_id = ? ORDER BY seq ASC"
      )
      .all(runId);

    return rows.map((row) => {
      if (!isCallStatus(row.status)) {
        throw new Error(`call_records row for ${row.problem_id} has unknown status ${row.status}`);
      }
      return {
        runId: row.run_id,
        seq: row.seq,
        problemId: row.problem_id,
        status: row.status,
        answer: row.answer,
        rawAnswer: row.raw_answer,
        rawError: row.raw_error,
        startedAt: row.started_at,
        deadlineAt: row.deadline_at,
        finishedAt: row.finished_at,
        elapsedMs: row.elapsed_ms,
      };
    });
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

import type { CallRecord } from "../contracts/problem";

export class DuplicateCallRecordError extends Error {
  constructor(runId: string, problemId: string) {
    super(`call record for problem "${problemId}" already exists in run ${runId}`);
    this.name = "DuplicateCallRecordError";
  }
}

/** Append-only log of per-problem call outcomes. One record per run and problem. */
export interface CallRecordStore {
  append(record: CallRecord): Promise<void>;
  listRun(runId: string): Promise<CallRecord[]>;
  close(): Promise<void>;
}

export class MemoryCallRecordStore implements CallRecordStore {
  private records: CallRecord[] = [];

  async append(record: CallRecord): Promise<void> {
    const exists = this.records.some(
      (existing) => existing.runId === record.runId && existing.problemId === record.problemId
    );
    if (exists) {
      throw new DuplicateCallRecordError(record.runId, record.problemId);
    }
    this.records.push({ ...record });
  }

  async listRun(runId: string): Promise<CallRecord[]> {
    return this.records
      .filter((record) => record.runId === runId)
      .sort((a, b) => a.seq - b.seq)
      .map((record) => ({ ...record }));
  }

  async close(): Promise<void> {
    // nothing to release
  }
}

import { randomUUID } from "node:crypto";
import { rm } from "node:fs/promises";

import { type SolverContracts, clampAnswer } from "../contracts/endpoints";
import {
  type CallRecord,
  type CallStatus,
  DEFAULT_ANSWER,
  type Problem,
  type ResultRow,
} from "../contracts/problem";
import { describeError, silentLogger, type RelayLogger } from "../logging/logger";
import type { RelayCaller } from "../relay/client";
import {
  CorruptEnvelopeError,
  HandlerFailureError,
  TimeoutError,
  TransportBrokenError,
} from "../relay/errors";
import type { CallRecordStore } from "../store/call_record_store";
import { type OrderOptions, buildEvaluationOrder } from "./ordering";
import { ResultSetError, validateResultSet, writeResultSet } from "./result_writer";

export type GatewayState = "INIT" | "CONNECTING" | "SERVING" | "FINALIZING" | "DONE" | "FAILED";

export type GatewayOptions = {
  problems: readonly Problem[];
  order: OrderOptions;
  deadlineMs: number;
  connect: () => Promise<RelayCaller<SolverContracts>>;
  store: CallRecordStore;
  resultPath: string;
  referenceAnswers?: ReadonlyMap<string, number>;
  runId?: string;
  log?: RelayLogger;
  now?: () => number;
  writeResults?: (path: string, rows: readonly ResultRow[]) => Promise<void>;
};

export type RunSummary = {
  total: number;
  byStatus: Record<CallStatus, number>;
  // True when a broken transport left problems unserved.
  aborted: boolean;
  elapsedMs: number;
  score?: { correct: number; scored: number };
};

export type GatewayRunResult = {
  runId: string;
  state: "DONE" | "FAILED";
  results: ResultRow[];
  records: CallRecord[];
  summary: RunSummary;
  failure?: { stage: "CONNECTING" | "FINALIZING"; error: string };
};

type CallOutcome = {
  status: CallStatus;
  rawAnswer: number | null;
  rawError: string | null;
  transportDead: boolean;
};

const emptyCounts = (): Record<CallStatus, number> => ({
  ok: 0,
  timeout: 0,
  handler_error: 0,
  transport_error: 0,
});

/**
 * Drives one evaluation run: order the problems, serve them one at a time
 * over the relay, record every outcome, and write one answer per problem.
 */
export class GatewayDriver {
  private state: GatewayState = "INIT";
  private readonly runId: string;
  private readonly log: RelayLogger;
  private readonly now: () => number;
  private readonly writeResults: (path: string, rows: readonly ResultRow[]) => Promise<void>;

  constructor(private readonly opts: GatewayOptions) {
    this.runId = opts.runId ?? randomUUID();
    this.log = opts.log ?? silentLogger;
    this.now = opts.now ?? Date.now;
    this.writeResults = opts.writeResults ?? writeResultSet;
  }

  get currentState(): GatewayState {
    return this.state;
  }

  async run(): Promise<GatewayRunResult> {
    const runStartedAt = this.now();
    const problems = this.opts.problems;

    // INIT
    const order = buildEvaluationOrder(
      problems.map((problem) => problem.id),
      this.opts.order
    );
    const byId = new Map(problems.map((problem) => [problem.id, problem]));
    await rm(this.opts.resultPath, { force: true });
    this.log.info(
      {
        evt: "gateway.init",
        runId: this.runId,
        problems: problems.length,
        orderMode: this.opts.order.mode,
        deadlineMs: this.opts.deadlineMs,
      },
      "gateway.init"
    );

    this.transition("CONNECTING");
    let caller: RelayCaller<SolverContracts>;
    try {
      caller = await this.opts.connect();
    } catch (error) {
      return this.fail("CONNECTING", error, [], false, runStartedAt);
    }

    const records: CallRecord[] = [];
    let transportDead = false;
    try {
      this.transition("SERVING");

      for (const [seq, problemId] of order.entries()) {
        const problem = byId.get(problemId);
        if (!problem) continue;

        let record: CallRecord;
        if (transportDead) {
          record = this.unservedRecord(problem, seq);
        } else {
          const served = await this.serveOne(caller, problem, seq);
          record = served.record;
          transportDead = served.transportDead;
        }

        records.push(record);
        await this.persistRecord(record);
      }

      this.transition("FINALIZING");
      const results = this.collectResults(records);
      const issues = validateResultSet(results, problems);
      if (issues.length > 0) {
        return this.fail("FINALIZING", new ResultSetError(issues), records, transportDead, runStartedAt);
      }

      try {
        await this.writeResults(this.opts.resultPath, results);
      } catch (error) {
        await rm(this.opts.resultPath, { force: true });
        return this.fail("FINALIZING", error, records, transportDead, runStartedAt);
      }

      this.transition("DONE");
      const summary = this.summarize(records, results, transportDead, runStartedAt);
      this.log.info(
        { evt: "gateway.run_complete", runId: this.runId, resultPath: this.opts.resultPath, ...summary },
        "gateway.run_complete"
      );
      return { runId: this.runId, state: "DONE", results, records, summary };
    } finally {
      await caller.close().catch((error: unknown) => {
        this.log.warn(
          { evt: "gateway.channel_close_failed", error: describeError(error) },
          "gateway.channel_close_failed"
        );
      });
    }
  }

  private async serveOne(
    caller: RelayCaller<SolverContracts>,
    problem: Problem,
    seq: number
  ): Promise<{ record: CallRecord; transportDead: boolean }> {
    const startedAt = this.now();
    const deadlineAt = startedAt + this.opts.deadlineMs;
    this.log.debug(
      { evt: "gateway.call_started", runId: this.runId, seq, problemId: problem.id },
      "gateway.call_started"
    );

    const outcome = await caller
      .call("predict", { id: problem.id, problem: problem.statement }, this.opts.deadlineMs)
      .then(
        (response): CallOutcome => ({
          status: "ok",
          rawAnswer: response.answer,
          rawError: null,
          transportDead: false,
        }),
        (error: unknown) => this.classifyFailure(error)
      );

    const finishedAt = this.now();
    const record: CallRecord = {
      runId: this.runId,
      seq,
      problemId: problem.id,
      status: outcome.status,
      answer: outcome.status === "ok" && outcome.rawAnswer !== null
        ? clampAnswer(outcome.rawAnswer)
        : DEFAULT_ANSWER,
      rawAnswer: outcome.rawAnswer,
      rawError: outcome.rawError,
      startedAt: new Date(startedAt).toISOString(),
      deadlineAt: new Date(deadlineAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      elapsedMs: finishedAt - startedAt,
    };

    const level = outcome.status === "ok" ? "info" : "warn";
    this.log[level](
      {
        evt: "gateway.call_finished",
        runId: this.runId,
        seq,
        problemId: problem.id,
        status: record.status,
        answer: record.answer,
        elapsedMs: record.elapsedMs,
        ...(record.rawError ? { error: record.rawError } : {}),
      },
      "gateway.call_finished"
    );

    return { record, transportDead: outcome.transportDead };
  }

  private classifyFailure(error: unknown): CallOutcome {
    const rawError = describeError(error);
    if (error instanceof HandlerFailureError) {
      return { status: "handler_error", rawAnswer: null, rawError, transportDead: false };
    }
    if (error instanceof TimeoutError) {
      return { status: "timeout", rawAnswer: null, rawError, transportDead: false };
    }
    if (error instanceof TransportBrokenError) {
      this.log.error(
        { evt: "gateway.transport_broken", runId: this.runId, error: rawError },
        "gateway.transport_broken"
      );
      return { status: "transport_error", rawAnswer: null, rawError, transportDead: true };
    }
    if (error instanceof CorruptEnvelopeError) {
      return { status: "transport_error", rawAnswer: null, rawError, transportDead: false };
    }
    this.log.error(
      { evt: "gateway.call_failed_unexpectedly", runId: this.runId, error: rawError },
      "gateway.call_failed_unexpectedly"
    );
    return { status: "transport_error", rawAnswer: null, rawError, transportDead: false };
  }

  private unservedRecord(problem: Problem, seq: number): CallRecord {
    const at = new Date(this.now()).toISOString();
    return {
      runId: this.runId,
      seq,
      problemId: problem.id,
      status: "transport_error",
      answer: DEFAULT_ANSWER,
      rawAnswer: null,
      rawError: "not served: relay transport broken earlier in the run",
      startedAt: at,
      deadlineAt: at,
      finishedAt: at,
      elapsedMs: 0,
    };
  }

  private async persistRecord(record: CallRecord) {
    try {
      await this.opts.store.append(record);
    } catch (error) {
      this.log.error(
        {
          evt: "gateway.call_record_persist_failed",
          runId: this.runId,
          problemId: record.problemId,
          error: describeError(error),
        },
        "gateway.call_record_persist_failed"
      );
    }
  }

  // Original problem order, never evaluation order.
  private collectResults(records: readonly CallRecord[]): ResultRow[] {
    const answers = new Map(records.map((record) => [record.problemId, record.answer]));
    return this.opts.problems.map((problem) => ({
      id: problem.id,
      answer: answers.get(problem.id) ?? DEFAULT_ANSWER,
    }));
  }

  private summarize(
    records: readonly CallRecord[],
    results: readonly ResultRow[],
    aborted: boolean,
    runStartedAt: number
  ): RunSummary {
    const byStatus = emptyCounts();
    for (const record of records) {
      byStatus[record.status] += 1;
    }

    const summary: RunSummary = {
      total: records.length,
      byStatus,
      aborted,
      elapsedMs: this.now() - runStartedAt,
    };

    const reference = this.opts.referenceAnswers;
    if (reference && reference.size > 0) {
      let correct = 0;
      let scored = 0;
      for (const row of results) {
        const expected = reference.get(row.id);
        if (expected === undefined) continue;
        scored += 1;
        if (expected === row.answer) correct += 1;
      }
      summary.score = { correct, scored };
    }

    return summary;
  }

  private fail(
    stage: "CONNECTING" | "FINALIZING",
    error: unknown,
    records: CallRecord[],
    aborted: boolean,
    runStartedAt: number
  ): GatewayRunResult {
    this.transition("FAILED");
    const message = describeError(error);
    this.log.error(
      { evt: "gateway.run_failed", runId: this.runId, stage, error: message },
      "gateway.run_failed"
    );
    return {
      runId: this.runId,
      state: "FAILED",
      results: [],
      records,
      summary: this.summarize(records, [], aborted, runStartedAt),
      failure: { stage, error: message },
    };
  }

  private transition(next: GatewayState) {
    this.log.info(
      { evt: "gateway.state", runId: this.runId, from: this.state, to: next },
      "gateway.state"
    );
    this.state = next;
  }
}

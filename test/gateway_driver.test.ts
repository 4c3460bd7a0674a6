import { access, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  type EndpointName,
  type PredictRequest,
  type PredictResponse,
  type RequestOf,
  type ResponseOf,
  type SolverContracts,
  solverContracts,
} from "../src/contracts/endpoints";
import type { CallRecord, Problem } from "../src/contracts/problem";
import { GatewayDriver, type GatewayOptions } from "../src/gateway/driver";
import { buildEvaluationOrder } from "../src/gateway/ordering";
import type { RelayCaller } from "../src/relay/client";
import { EnvelopeCodec } from "../src/relay/codec";
import {
  ConnectionUnavailableError,
  CorruptEnvelopeError,
  HandlerFailureError,
  TimeoutError,
  TransportBrokenError,
} from "../src/relay/errors";
import { type CallRecordStore, MemoryCallRecordStore } from "../src/store/call_record_store";

const codec = new EnvelopeCodec(solverContracts);

// Stands in for the relay: answers predict through a scripted function.
class ScriptedCaller implements RelayCaller<SolverContracts> {
  readonly served: string[] = [];
  closed = false;

  constructor(private readonly script: (request: PredictRequest) => PredictResponse | Promise<PredictResponse>) {}

  async call<E extends EndpointName<SolverContracts>>(
    endpoint: E,
    request: RequestOf<SolverContracts, E>,
    _deadlineMs: number
  ): Promise<ResponseOf<SolverContracts, E>> {
    const predict = codec.validate("predict", "request", request);
    this.served.push(predict.id);
    return codec.validate(endpoint, "response", await this.script(predict));
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const exists = (path: string) =>
  access(path).then(
    () => true,
    () => false
  );

const problemsOf = (...statements: string[]): Problem[] =>
  statements.map((statement, index) => ({ id: `p${index + 1}`, statement }));

describe("GatewayDriver", () => {
  let dir: string;
  let resultPath: string;
  let store: MemoryCallRecordStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "gateway-"));
    resultPath = join(dir, "submission.csv");
    store = new MemoryCallRecordStore();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const driverFor = (
    problems: Problem[],
    caller: ScriptedCaller,
    overrides: Partial<GatewayOptions> = {}
  ) =>
    new GatewayDriver({
      problems,
      order: { mode: "fixed-seeded", seed: 11 },
      deadlineMs: 1000,
      connect: async () => caller,
      store,
      resultPath,
      runId: "run-test",
      ...overrides,
    });

  it("serves every problem once in evaluation order and writes answers in problem order", async () => {
    const problems = problemsOf("-5", "150000", "42", "7");
    const caller = new ScriptedCaller((request) => ({ answer: Number(request.problem) }));

    const result = await driverFor(problems, caller).run();

    expect(result.state).toBe("DONE");
    expect(caller.served).toEqual(
      buildEvaluationOrder(["p1", "p2", "p3", "p4"], { mode: "fixed-seeded", seed: 11 })
    );
    expect(result.results).toEqual([
      { id: "p1", answer: 0 },
      { id: "p2", answer: 99999 },
      { id: "p3", answer: 42 },
      { id: "p4", answer: 7 },
    ]);
    expect(await readFile(resultPath, "utf8")).toBe("id,answer\np1,0\np2,99999\np3,42\np4,7\n");
    expect(caller.closed).toBe(true);
  });

  it("keeps the raw answer next to the clamped one", async () => {
    const problems = problemsOf("-5");
    const caller = new ScriptedCaller((request) => ({ answer: Number(request.problem) }));

    const { records } = await driverFor(problems, caller).run();

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ status: "ok", rawAnswer: -5, answer: 0, rawError: null });
  });

  it("records each failure kind and answers zero for it", async () => {
    const problems = problemsOf("handler", "timeout", "ok", "corrupt");
    const caller = new ScriptedCaller((request) => {
      switch (request.problem) {
        case "handler":
          throw new HandlerFailureError("boom", "handler_failure", "Error");
        case "timeout":
          throw new TimeoutError("predict", 1000);
        case "corrupt":
          throw new CorruptEnvelopeError("envelope rejected");
        default:
          return { answer: 9 };
      }
    });

    const result = await driverFor(problems, caller).run();

    expect(result.state).toBe("DONE");
    expect(result.results).toEqual([
      { id: "p1", answer: 0 },
      { id: "p2", answer: 0 },
      { id: "p3", answer: 9 },
      { id: "p4", answer: 0 },
    ]);
    expect(result.summary.byStatus).toEqual({ ok: 1, timeout: 1, handler_error: 1, transport_error: 1 });
    expect(result.summary.aborted).toBe(false);
    expect(caller.served).toHaveLength(4);

    const byProblem = new Map(result.records.map((record) => [record.problemId, record]));
    expect(byProblem.get("p1")?.status).toBe("handler_error");
    expect(byProblem.get("p1")?.rawError).toBe("HandlerFailureError: boom");
    expect(byProblem.get("p2")?.status).toBe("timeout");
    expect(byProblem.get("p4")?.status).toBe("transport_error");
  });

  it("stops calling after the transport breaks and still writes a complete file", async () => {
    const problems = problemsOf("a", "b", "c");
    const caller = new ScriptedCaller(() => {
      throw new TransportBrokenError("relay transport failed: socket hang up");
    });

    const result = await driverFor(problems, caller).run();

    expect(result.state).toBe("DONE");
    expect(caller.served).toHaveLength(1);
    expect(result.summary.aborted).toBe(true);
    expect(result.summary.byStatus.transport_error).toBe(3);
    expect(result.records.slice(1).map((record) => record.rawError)).toEqual([
      "not served: relay transport broken earlier in the run",
      "not served: relay transport broken earlier in the run",
    ]);
    expect(await readFile(resultPath, "utf8")).toBe("id,answer\np1,0\np2,0\np3,0\n");
  });

  it("persists one call record per problem", async () => {
    const problems = problemsOf("1", "2", "3");
    const caller = new ScriptedCaller((request) => ({ answer: Number(request.problem) }));

    await driverFor(problems, caller).run();

    const stored = await store.listRun("run-test");
    expect(stored.map((record) => record.seq)).toEqual([0, 1, 2]);
    expect(stored.map((record) => record.problemId).sort()).toEqual(["p1", "p2", "p3"]);
  });

  it("finishes the run when the record store fails", async () => {
    const failingStore: CallRecordStore = {
      append: async (_record: CallRecord) => {
        throw new Error("disk full");
      },
      listRun: async () => [],
      close: async () => undefined,
    };
    const caller = new ScriptedCaller(() => ({ answer: 1 }));

    const result = await driverFor(problemsOf("x"), caller, { store: failingStore }).run();

    expect(result.state).toBe("DONE");
    expect(result.results).toEqual([{ id: "p1", answer: 1 }]);
  });

  it("scores against reference answers when given", async () => {
    const problems = problemsOf("0", "6", "42");
    const caller = new ScriptedCaller((request) => ({ answer: Number(request.problem) }));
    const referenceAnswers = new Map([
      ["p1", 0],
      ["p2", 5],
      ["p3", 42],
    ]);

    const result = await driverFor(problems, caller, { referenceAnswers }).run();

    expect(result.summary.score).toEqual({ correct: 2, scored: 3 });
  });

  it("fails without a result file when the relay never comes up", async () => {
    await writeFile(resultPath, "id,answer\nstale,1\n", "utf8");
    const caller = new ScriptedCaller(() => ({ answer: 1 }));

    const driver = driverFor(problemsOf("a"), caller, {
      connect: async () => {
        throw new ConnectionUnavailableError("relay peer unreachable", 12);
      },
    });
    const result = await driver.run();

    expect(result.state).toBe("FAILED");
    expect(driver.currentState).toBe("FAILED");
    expect(result.failure).toEqual({
      stage: "CONNECTING",
      error: "ConnectionUnavailableError: relay peer unreachable",
    });
    expect(caller.served).toEqual([]);
    expect(await exists(resultPath)).toBe(false);
  });

  it("fails without a result file when writing it fails", async () => {
    const caller = new ScriptedCaller(() => ({ answer: 3 }));

    const result = await driverFor(problemsOf("a", "b"), caller, {
      writeResults: async (path) => {
        await writeFile(path, "id,answer\np1,", "utf8");
        throw new Error("no space left on device");
      },
    }).run();

    expect(result.state).toBe("FAILED");
    expect(result.failure).toEqual({ stage: "FINALIZING", error: "Error: no space left on device" });
    expect(result.records).toHaveLength(2);
    expect(await exists(resultPath)).toBe(false);
    expect(caller.closed).toBe(true);
  });

  it("writes an empty result file for an empty problem set", async () => {
    const caller = new ScriptedCaller(() => ({ answer: 1 }));

    const result = await driverFor([], caller).run();

    expect(result.state).toBe("DONE");
    expect(await readFile(resultPath, "utf8")).toBe("id,answer\n");
  });
});

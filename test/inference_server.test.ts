import { describe, it, expect } from "vitest";
import { z } from "zod";

import { solverContracts } from "../src/contracts/endpoints";
import { HandlerFailureError, MissingEndpointError } from "../src/relay/errors";
import { InferenceServer } from "../src/responder/inference_server";
import { type SolverModule, baselineSolver, createPredictServer } from "../src/responder/solver";

const ctx = () => ({ callId: "c-1", signal: new AbortController().signal });
const json = (value: unknown) => Buffer.from(JSON.stringify(value), "utf8");

const makeSolver = () => {
  const seen: string[] = [];
  const handle = { calls: 0, seen };
  let inits = 0;
  const solver: SolverModule<typeof handle> = {
    name: "adder",
    init: () => {
      inits += 1;
      return handle;
    },
    predict: (h, problem, solveCtx) => {
      h.calls += 1;
      h.seen.push(solveCtx.problemId);
      if (problem === "boom") throw new Error("boom");
      if (problem === "fraction") return 1.5;
      const [a, b] = problem.split("+").map(Number);
      return a + b;
    },
  };
  return { solver, handle, inits: () => inits };
};

describe("InferenceServer dispatch", () => {
  const server = new InferenceServer({ contracts: solverContracts, handle: null });
  server.register("predict", (request) => {
    if (request.problem === "boom") throw new TypeError("bad state");
    if (request.problem === "fraction") return { answer: 0.25 };
    return { answer: request.problem.length };
  });

  it("answers a valid request", async () => {
    const outcome = await server.dispatch("predict", json({ id: "p1", problem: "abc" }), ctx());
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(JSON.parse(outcome.payload.toString("utf8"))).toEqual({ answer: 3 });
    }
  });

  it("reports an unknown endpoint", async () => {
    const outcome = await server.dispatch("describe", json({}), ctx());
    expect(outcome).toEqual({
      ok: false,
      error: {
        code: "unknown_endpoint",
        message: 'unknown endpoint "describe"',
        error_name: "UnknownEndpointError",
      },
    });
  });

  it("reports a payload that is not JSON as an invalid request", async () => {
    const outcome = await server.dispatch("predict", Buffer.from("{oops", "utf8"), ctx());
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.code).toBe("invalid_request");
  });

  it("reports a request that breaks the contract as an invalid request", async () => {
    const outcome = await server.dispatch("predict", json({ id: "", problem: "x" }), ctx());
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.code).toBe("invalid_request");
  });

  it("turns a handler exception into a handler_failure payload", async () => {
    const outcome = await server.dispatch("predict", json({ id: "p1", problem: "boom" }), ctx());
    expect(outcome).toEqual({
      ok: false,
      error: { code: "handler_failure", message: "bad state", error_name: "TypeError" },
    });
  });

  it("rejects a response that breaks the contract", async () => {
    const outcome = await server.dispatch("predict", json({ id: "p1", problem: "fraction" }), ctx());
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error.code).toBe("invalid_response");
  });

  it("keeps serving after a handler failure", async () => {
    await server.dispatch("predict", json({ id: "p1", problem: "boom" }), ctx());
    const outcome = await server.dispatch("predict", json({ id: "p2", problem: "ab" }), ctx());
    expect(outcome.ok).toBe(true);
  });
});

describe("InferenceServer validation", () => {
  it("refuses to run without the required endpoints", () => {
    const server = new InferenceServer({ contracts: solverContracts, handle: null });
    expect(() => server.validate()).toThrow(MissingEndpointError);
    expect(() => server.validate()).toThrow("required endpoints not registered: predict");
  });

  it("checks every contract endpoint when none are named", () => {
    const contracts = {
      predict: solverContracts.predict,
      describe: { request: z.object({}), response: z.object({ name: z.string() }) },
    };
    const server = new InferenceServer({ contracts, handle: null });
    server.register("predict", () => ({ answer: 1 }));
    expect(() => server.validate()).toThrow("required endpoints not registered: describe");
  });
});

describe("createPredictServer", () => {
  it("initialises the solver once and shares its handle across calls", async () => {
    const { solver, handle, inits } = makeSolver();
    const server = await createPredictServer(solver);

    expect(await server.invoke("predict", { id: "p1", problem: "2+2" })).toEqual({ answer: 4 });
    expect(await server.invoke("predict", { id: "p2", problem: "40+2" })).toEqual({ answer: 42 });

    expect(inits()).toBe(1);
    expect(handle.calls).toBe(2);
    expect(handle.seen).toEqual(["p1", "p2"]);
    expect(server.callsServed).toBe(2);
  });

  it("raises HandlerFailureError for a failing predict", async () => {
    const { solver } = makeSolver();
    const server = await createPredictServer(solver);

    const failure = await server.invoke("predict", { id: "p1", problem: "boom" }).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(HandlerFailureError);
    expect(failure).toMatchObject({ remoteCode: "handler_failure", message: "boom" });
  });

  it("rejects a non-integer answer as an invalid response", async () => {
    const { solver } = makeSolver();
    const server = await createPredictServer(solver);

    await expect(server.invoke("predict", { id: "p1", problem: "fraction" })).rejects.toMatchObject({
      remoteCode: "invalid_response",
    });
  });

  it("baseline solver answers zero", async () => {
    const server = await createPredictServer(baselineSolver);
    expect(await server.invoke("predict", { id: "p1", problem: "anything" })).toEqual({ answer: 0 });
  });
});

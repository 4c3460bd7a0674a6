import {
  REQUIRED_SOLVER_ENDPOINTS,
  type SolverContracts,
  solverContracts,
} from "../contracts/endpoints";
import { createLogger, type RelayLogger } from "../logging/logger";
import { type HandlerContext, InferenceServer } from "./inference_server";

export type SolveContext = Omit<HandlerContext<unknown>, "handle"> & { problemId: string };

/**
 * User solving logic. init() runs once at startup and yields a read-only
 * handle (loaded weights, a client, a cache) that every predict() receives.
 */
export type SolverModule<H> = {
  name: string;
  init: () => Promise<H> | H;
  predict: (handle: H, problem: string, ctx: SolveContext) => Promise<number> | number;
};

export type PredictServer<H> = InferenceServer<SolverContracts, H>;

export async function createPredictServer<H>(
  solver: SolverModule<H>,
  opts: { log?: RelayLogger } = {}
): Promise<PredictServer<H>> {
  const log = opts.log ?? createLogger("responder");
  const initStartedAt = Date.now();
  const handle = await solver.init();
  log.info(
    { evt: "responder.solver_ready", solver: solver.name, initMs: Date.now() - initStartedAt },
    "responder.solver_ready"
  );

  const server = new InferenceServer<SolverContracts, H>({
    contracts: solverContracts,
    handle,
    requiredEndpoints: REQUIRED_SOLVER_ENDPOINTS,
    log,
  });

  server.register("predict", async (request, ctx) => {
    const { handle, ...rest } = ctx;
    const answer = await solver.predict(handle, request.problem, { ...rest, problemId: request.id });
    return { answer };
  });
  server.validate();
  return server;
}

// Placeholder that answers 0 to everything.
export const baselineSolver: SolverModule<null> = {
  name: "baseline",
  init: () => null,
  predict: () => 0,
};

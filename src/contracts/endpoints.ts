import { z } from "zod";

export type EndpointContract = {
  request: z.ZodTypeAny;
  response: z.ZodTypeAny;
};

export type ContractMap = Record<string, EndpointContract>;

export type EndpointName<C extends ContractMap> = keyof C & string;
export type RequestOf<C extends ContractMap, E extends EndpointName<C>> = z.output<C[E]["request"]>;
export type ResponseOf<C extends ContractMap, E extends EndpointName<C>> = z.output<C[E]["response"]>;

export const ANSWER_MIN = 0;
export const ANSWER_MAX = 99_999;

export const PredictRequest = z.object({
  id: z.string().min(1),
  problem: z.string(),
});

export type PredictRequest = z.infer<typeof PredictRequest>;

// Range is enforced by the gateway's clamp, not here: out-of-range integers are valid answers to clamp.
export const PredictResponse = z.object({
  answer: z.number().int().finite(),
});

export type PredictResponse = z.infer<typeof PredictResponse>;

export const solverContracts = {
  predict: { request: PredictRequest, response: PredictResponse },
} satisfies ContractMap;

export type SolverContracts = typeof solverContracts;

export const REQUIRED_SOLVER_ENDPOINTS = ["predict"] as const satisfies ReadonlyArray<
  EndpointName<SolverContracts>
>;

export function clampAnswer(answer: number): number {
  return Math.min(ANSWER_MAX, Math.max(ANSWER_MIN, Math.trunc(answer)));
}

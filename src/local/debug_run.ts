import { clampAnswer } from "../contracts/endpoints";
import { DEFAULT_ANSWER, type Problem } from "../contracts/problem";
import { describeError, silentLogger, type RelayLogger } from "../logging/logger";
import type { PredictServer } from "../responder/solver";

export type DebugProblemResult = {
  id: string;
  answer: number;
  expected?: number;
  correct?: boolean;
  error?: string;
  elapsedMs: number;
};

export type DebugRunReport = {
  results: DebugProblemResult[];
  correct: number;
  scored: number;
};

/**
 * Calls predict in process for every problem, without the relay, and scores
 * the clamped answers against the reference answers where present.
 */
export async function runLocalDebug<H>(args: {
  server: PredictServer<H>;
  problems: readonly Problem[];
  referenceAnswers?: ReadonlyMap<string, number>;
  log?: RelayLogger;
}): Promise<DebugRunReport> {
  const log = args.log ?? silentLogger;
  const results: DebugProblemResult[] = [];
  let correct = 0;
  let scored = 0;

  for (const problem of args.problems) {
    const startedAt = Date.now();
    let answer = DEFAULT_ANSWER;
    let error: string | undefined;
    try {
      const response = await args.server.invoke("predict", {
        id: problem.id,
        problem: problem.statement,
      });
      answer = clampAnswer(response.answer);
    } catch (err) {
      error = describeError(err);
    }

    const expected = args.referenceAnswers?.get(problem.id);
    const result: DebugProblemResult = {
      id: problem.id,
      answer,
      elapsedMs: Date.now() - startedAt,
      ...(error ? { error } : {}),
    };
    if (expected !== undefined) {
      result.expected = expected;
      result.correct = expected === answer;
      scored += 1;
      if (result.correct) correct += 1;
    }
    results.push(result);

    log.info({ evt: "local.problem_done", ...result }, "local.problem_done");
  }

  log.info({ evt: "local.score", correct, scored }, "local.score");
  return { results, correct, scored };
}

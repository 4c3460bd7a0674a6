export type Problem = {
  readonly id: string;
  readonly statement: string;
};

export type CallStatus = "ok" | "timeout" | "handler_error" | "transport_error";

export const CALL_STATUSES: readonly CallStatus[] = [
  "ok",
  "timeout",
  "handler_error",
  "transport_error",
];

export type CallRecord = {
  runId: string;
  // Position in evaluation order, 0-based.
  seq: number;
  problemId: string;
  status: CallStatus;
  answer: number;
  rawAnswer: number | null;
  rawError: string | null;
  startedAt: string;
  deadlineAt: string;
  finishedAt: string;
  elapsedMs: number;
};

export type ResultRow = {
  id: string;
  answer: number;
};

export const DEFAULT_ANSWER = 0;

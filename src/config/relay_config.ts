import { config as loadEnv } from "dotenv";
import { z } from "zod";

import type { OrderOptions } from "../gateway/ordering";
import { isLoopbackHost, parseRelayAddress } from "../relay/address";
import { type BackoffPolicy, MAX_TIMER_MS } from "../relay/dialer";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const isTruthy = (value?: string) =>
  value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase());

const positiveMs = (fallback: number) =>
  z.coerce.number().int().positive().max(MAX_TIMER_MS).default(fallback);

const RelayEnv = z.object({
  RELAY_ADDRESS: z.string().min(1).default("127.0.0.1:50051"),
  RELAY_STARTUP_GRACE_MS: positiveMs(15 * 60 * 1000),
  RELAY_BACKOFF_INITIAL_MS: positiveMs(100),
  RELAY_BACKOFF_MAX_MS: positiveMs(5_000),
});

const GatewayEnv = RelayEnv.extend({
  PREDICT_DEADLINE_MS: positiveMs(5 * 60 * 1000),
  EVAL_ORDER_MODE: z.enum(["random", "fixed-seeded"]).default("random"),
  EVAL_ORDER_SEED: z.coerce.number().int().nonnegative().max(2 ** 32 - 1).optional(),
  PROBLEMS_CSV_PATH: z.string().min(1).default("./data/test.csv"),
  RESULTS_CSV_PATH: z.string().min(1).default("./data/submission.csv"),
  CALL_RECORD_DB_PATH: z.string().min(1).optional(),
});

const ResponderEnv = RelayEnv.extend({
  RELAY_IS_SCORED_RUN: z.string().optional(),
  REFERENCE_CSV_PATH: z.string().min(1).default("./data/reference.csv"),
});

export type GatewayConfig = {
  address: string;
  backoff: BackoffPolicy;
  deadlineMs: number;
  order: OrderOptions;
  problemsPath: string;
  resultsPath: string;
  callRecordDbPath?: string;
};

export type ResponderConfig = {
  address: string;
  scoredRun: boolean;
  referencePath: string;
};

type Env = Record<string, string | undefined>;

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  // Empty strings count as unset, as they do in most .env files.
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ""));
  const parsed = schema.safeParse(cleaned);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid configuration: ${detail}`);
  }
  return parsed.data;
}

function resolveAddress(raw: string): string {
  let host: string;
  try {
    host = parseRelayAddress(raw).host;
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
  if (!isLoopbackHost(host)) {
    throw new ConfigError(`relay address "${raw}" is not a loopback address`);
  }
  return raw;
}

export function loadGatewayConfig(env: Env = process.env, argv: string[] = []): GatewayConfig {
  const parsed = parseEnv(GatewayEnv, env);

  let order: OrderOptions;
  if (parsed.EVAL_ORDER_MODE === "fixed-seeded") {
    if (parsed.EVAL_ORDER_SEED === undefined) {
      throw new ConfigError("EVAL_ORDER_SEED is required when EVAL_ORDER_MODE=fixed-seeded");
    }
    order = { mode: "fixed-seeded", seed: parsed.EVAL_ORDER_SEED };
  } else {
    order = { mode: "random" };
  }

  return {
    address: resolveAddress(argv[0] ?? parsed.RELAY_ADDRESS),
    backoff: {
      initialDelayMs: parsed.RELAY_BACKOFF_INITIAL_MS,
      maxDelayMs: parsed.RELAY_BACKOFF_MAX_MS,
      factor: 2,
      graceMs: parsed.RELAY_STARTUP_GRACE_MS,
    },
    deadlineMs: parsed.PREDICT_DEADLINE_MS,
    order,
    problemsPath: parsed.PROBLEMS_CSV_PATH,
    resultsPath: parsed.RESULTS_CSV_PATH,
    ...(parsed.CALL_RECORD_DB_PATH ? { callRecordDbPath: parsed.CALL_RECORD_DB_PATH } : {}),
  };
}

export function loadResponderConfig(env: Env = process.env, argv: string[] = []): ResponderConfig {
  const parsed = parseEnv(ResponderEnv, env);
  return {
    address: resolveAddress(argv[0] ?? parsed.RELAY_ADDRESS),
    scoredRun: isTruthy(parsed.RELAY_IS_SCORED_RUN),
    referencePath: parsed.REFERENCE_CSV_PATH,
  };
}

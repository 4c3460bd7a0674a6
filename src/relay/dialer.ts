import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";

import { RELAY_CALL_PATH, RELAY_CONTENT_TYPE, type Envelope } from "../contracts/envelope";
import { describeError, silentLogger, type RelayLogger } from "../logging/logger";
import { type RelayAddress, relayBaseUrl } from "./address";
import { decodeEnvelope, encodeEnvelope } from "./codec";
import {
  ConnectionUnavailableError,
  CorruptEnvelopeError,
  TimeoutError,
  TransportBrokenError,
} from "./errors";

// Node turns larger setTimeout delays into 1 ms.
export const MAX_TIMER_MS = 2 ** 31 - 1;

// Upper bound on one readiness probe; a peer busy in a synchronous init can accept and stay silent.
export const PROBE_TIMEOUT_MS = 2_000;

export type BackoffPolicy = {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  graceMs: number;
};

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialDelayMs: 100,
  maxDelayMs: 5_000,
  factor: 2,
  graceMs: 15 * 60 * 1000,
};

type DialerOptions = {
  address: RelayAddress;
  log?: RelayLogger;
  backoff?: Partial<BackoffPolicy>;
  fetchImpl?: typeof fetch;
  sleepImpl?: (ms: number) => Promise<unknown>;
  now?: () => number;
};

/** Delay before retry number `attempt` (1-based), capped at maxDelayMs. */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  const raw = policy.initialDelayMs * policy.factor ** Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, raw);
}

const isAbortError = (error: unknown) => error instanceof Error && error.name === "AbortError";

export class RelayDialer {
  private readonly baseUrl: string;
  private readonly log: RelayLogger;
  private readonly backoff: BackoffPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number) => Promise<unknown>;
  private readonly now: () => number;
  private readonly inflight = new Set<AbortController>();
  private connected = false;
  private closed = false;

  constructor(opts: DialerOptions) {
    this.baseUrl = relayBaseUrl(opts.address);
    this.log = opts.log ?? silentLogger;
    this.backoff = { ...DEFAULT_BACKOFF, ...opts.backoff };
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleepImpl = opts.sleepImpl ?? sleep;
    this.now = opts.now ?? Date.now;
  }

  get isConnected(): boolean {
    return this.connected && !this.closed;
  }

  /**
   * Probes the listener's /healthz until it answers or the grace period runs
   * out. The peer is started independently and may not be listening yet.
   */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new TransportBrokenError("relay channel is closed");
    }

    const url = new URL("/healthz", this.baseUrl).toString();
    const startedAt = this.now();
    let attempt = 0;
    let lastError = "";

    for (;;) {
      attempt += 1;
      const remaining = this.backoff.graceMs - (this.now() - startedAt);
      const probeTimeoutMs = Math.max(1, Math.min(PROBE_TIMEOUT_MS, remaining));
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), probeTimeoutMs);
      this.inflight.add(controller);
      try {
        const response = await this.fetchImpl(url, { method: "GET", signal: controller.signal });
        if (response.ok) {
          this.connected = true;
          this.log.info(
            { evt: "relay.dialer_connected", url: this.baseUrl, attempts: attempt },
            "relay.dialer_connected"
          );
          return;
        }
        lastError = `status ${response.status}`;
      } catch (error) {
        if (this.closed) {
          throw new TransportBrokenError("relay channel closed while connecting", { cause: error });
        }
        lastError = isAbortError(error)
          ? `no answer within ${probeTimeoutMs}ms`
          : describeError(error);
      } finally {
        clearTimeout(timer);
        this.inflight.delete(controller);
      }

      const elapsed = this.now() - startedAt;
      const delay = backoffDelay(this.backoff, attempt);
      if (elapsed + delay > this.backoff.graceMs) {
        this.log.error(
          {
            evt: "relay.dialer_unreachable_fatal",
            url: this.baseUrl,
            attempts: attempt,
            elapsedMs: elapsed,
            error: lastError,
          },
          "relay.dialer_unreachable_fatal"
        );
        throw new ConnectionUnavailableError(
          `relay peer at ${this.baseUrl} unreachable after ${attempt} attempts (${lastError})`,
          attempt
        );
      }

      this.log.info(
        {
          evt: "relay.dialer_waiting_for_peer",
          attempt,
          retryDelayMs: delay,
          error: lastError,
        },
        "relay.dialer_waiting_for_peer"
      );
      await this.sleepImpl(delay);
    }
  }

  /**
   * Sends one request envelope and waits for the matching reply. The deadline
   * applies to this call only; on expiry the request is aborted and any late
   * reply is dropped with it. Error envelopes are returned, not thrown: they
   * are data from the peer's handler, not transport faults.
   */
  async call(endpoint: string, payload: Buffer, deadlineMs: number): Promise<Envelope> {
    if (this.closed) {
      throw new TransportBrokenError("relay channel is closed");
    }
    if (!this.connected) {
      throw new TransportBrokenError("relay channel is not connected");
    }

    const callId = randomUUID();
    const body = encodeEnvelope({ callId, endpoint, payload, isError: false });
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, Math.min(deadlineMs, MAX_TIMER_MS));
    this.inflight.add(controller);

    try {
      let response: Response;
      let bytes: Buffer;
      try {
        response = await this.fetchImpl(new URL(RELAY_CALL_PATH, this.baseUrl).toString(), {
          method: "POST",
          headers: { "content-type": RELAY_CONTENT_TYPE },
          body,
          signal: controller.signal,
        });
        bytes = Buffer.from(await response.arrayBuffer());
      } catch (error) {
        if (timedOut) {
          throw new TimeoutError(endpoint, deadlineMs);
        }
        if (this.closed && isAbortError(error)) {
          throw new TransportBrokenError("relay channel closed during call", { cause: error });
        }
        this.connected = false;
        throw new TransportBrokenError(`relay transport failed: ${describeError(error)}`, {
          cause: error,
        });
      }

      if (response.status === 400) {
        throw new CorruptEnvelopeError(
          `peer rejected request envelope: ${bytes.toString("utf8").slice(0, 200)}`
        );
      }
      if (!response.ok) {
        throw new TransportBrokenError(`relay peer answered status ${response.status}`);
      }

      const envelope = decodeEnvelope(bytes);
      if (envelope.callId !== callId) {
        throw new CorruptEnvelopeError(
          `reply ${envelope.callId} does not match request ${callId}`
        );
      }
      if (envelope.endpoint !== endpoint) {
        throw new CorruptEnvelopeError(
          `reply tagged "${envelope.endpoint}" does not match endpoint "${endpoint}"`
        );
      }

      return envelope;
    } finally {
      clearTimeout(timer);
      this.inflight.delete(controller);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.connected = false;
    for (const controller of this.inflight) {
      controller.abort();
    }
    this.inflight.clear();
    this.log.info({ evt: "relay.dialer_closed", url: this.baseUrl }, "relay.dialer_closed");
  }
}

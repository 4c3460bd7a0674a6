import Fastify, { type FastifyInstance } from "fastify";

import {
  RELAY_CALL_PATH,
  RELAY_CONTENT_TYPE,
  type Envelope,
  type RelayErrorPayload,
} from "../contracts/envelope";
import { describeError, silentLogger, type RelayLogger } from "../logging/logger";
import { type RelayHealth, healthRoutes } from "../routes/healthz";
import { type RelayAddress, relayBaseUrl } from "./address";
import { decodeEnvelope, encodeEnvelope } from "./codec";
import { CorruptEnvelopeError } from "./errors";

const MAX_ENVELOPE_BYTES = 16 * 1024 * 1024;

export type IncomingCall = {
  callId: string;
  endpoint: string;
  payload: Buffer;
  receivedAt: number;
  // Fires when the caller gives up (deadline or disconnect) before a reply is sent.
  signal: AbortSignal;
  respond: (payload: Buffer) => void;
  respondError: (error: RelayErrorPayload) => void;
};

type ReplyOutcome =
  | { kind: "reply"; body: Buffer }
  | { kind: "abandoned" }
  | { kind: "closing" };

type ListenerOptions = {
  address: RelayAddress;
  log?: RelayLogger;
  service?: string;
};

/**
 * Listener side of the relay. Each POST to /relay/call becomes an
 * IncomingCall handed out by accept(), one at a time, in arrival order.
 */
export class RelayListener {
  readonly app: FastifyInstance;
  private readonly log: RelayLogger;
  private readonly queue: IncomingCall[] = [];
  private waiters: Array<(call: IncomingCall | null) => void> = [];
  private readonly inflight = new Set<(outcome: ReplyOutcome) => void>();
  private closed = false;
  private boundAddress: RelayAddress;

  constructor(opts: ListenerOptions) {
    this.log = opts.log ?? silentLogger;
    this.boundAddress = opts.address;
    this.app = Fastify({ logger: false, bodyLimit: MAX_ENVELOPE_BYTES });

    this.app.addContentTypeParser(
      RELAY_CONTENT_TYPE,
      { parseAs: "buffer" },
      (_req, body, done) => done(null, body)
    );
    this.app.register(healthRoutes, {
      service: opts.service ?? "relay-listener",
      health: () => this.health(),
    });
    this.app.register(async (app) => this.callRoutes(app));
  }

  get address(): RelayAddress {
    return this.boundAddress;
  }

  get url(): string {
    return relayBaseUrl(this.boundAddress);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  health(): RelayHealth {
    return { accepting: !this.closed, queued: this.queue.length, inflight: this.inflight.size };
  }

  async listen(): Promise<RelayAddress> {
    await this.app.listen({ host: this.boundAddress.host, port: this.boundAddress.port });
    const bound = this.app.server.address();
    if (bound && typeof bound === "object") {
      this.boundAddress = { host: this.boundAddress.host, port: bound.port };
    }
    this.log.info({ evt: "relay.listener_ready", url: this.url }, "relay.listener_ready");
    return this.boundAddress;
  }

  /** Resolves with the next live call, or null once the listener is closed. */
  accept(): Promise<IncomingCall | null> {
    while (this.queue.length > 0) {
      const next = this.queue.shift();
      if (next && !next.signal.aborted) return Promise.resolve(next);
      if (next) {
        this.log.warn(
          { evt: "relay.call_abandoned_in_queue", callId: next.callId, endpoint: next.endpoint },
          "relay.call_abandoned_in_queue"
        );
      }
    }
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    this.queue.length = 0;
    for (const settle of [...this.inflight]) {
      settle({ kind: "closing" });
    }
    await this.app.close();
    this.log.info({ evt: "relay.listener_closed" }, "relay.listener_closed");
  }

  private enqueue(call: IncomingCall) {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(call);
      return;
    }
    this.queue.push(call);
  }

  private async callRoutes(app: FastifyInstance) {
    app.post(RELAY_CALL_PATH, async (req, reply) => {
      if (this.closed) {
        return reply.code(503).send({ error: "relay_closing" });
      }

      const body = req.body;
      if (!Buffer.isBuffer(body)) {
        return reply.code(415).send({ error: "relay_expects_octet_stream" });
      }

      let envelope: Envelope;
      try {
        envelope = decodeEnvelope(body);
        if (envelope.isError) {
          throw new CorruptEnvelopeError("request envelope is flagged as an error");
        }
      } catch (error) {
        this.log.warn(
          { evt: "relay.request_envelope_corrupt", error: describeError(error) },
          "relay.request_envelope_corrupt"
        );
        return reply.code(400).send({ error: "corrupt_envelope", detail: describeError(error) });
      }

      const controller = new AbortController();
      const { callId, endpoint, payload: requestPayload } = envelope;
      const outcome = await new Promise<ReplyOutcome>((resolve) => {
        let settled = false;
        const settle = (value: ReplyOutcome) => {
          if (settled) return;
          settled = true;
          this.inflight.delete(settle);
          resolve(value);
        };
        this.inflight.add(settle);

        reply.raw.on("close", () => {
          if (!reply.raw.writableFinished) {
            controller.abort();
            settle({ kind: "abandoned" });
          }
        });

        this.enqueue({
          callId,
          endpoint,
          payload: requestPayload,
          receivedAt: Date.now(),
          signal: controller.signal,
          respond: (payload) =>
            settle({
              kind: "reply",
              body: encodeEnvelope({ callId, endpoint, payload, isError: false }),
            }),
          respondError: (error) =>
            settle({
              kind: "reply",
              body: encodeEnvelope({
                callId,
                endpoint,
                payload: Buffer.from(JSON.stringify(error), "utf8"),
                isError: true,
              }),
            }),
        });
      });

      if (outcome.kind === "abandoned") {
        this.log.warn({ evt: "relay.call_abandoned", callId, endpoint }, "relay.call_abandoned");
        return reply;
      }
      if (outcome.kind === "closing") {
        controller.abort();
        return reply.code(503).send({ error: "relay_closing" });
      }

      return reply.code(200).header("content-type", RELAY_CONTENT_TYPE).send(outcome.body);
    });
  }
}

import type { RelayErrorPayload } from "../contracts/envelope";
import {
  type ContractMap,
  type EndpointName,
  type RequestOf,
  type ResponseOf,
} from "../contracts/endpoints";
import { describeError, silentLogger, type RelayLogger } from "../logging/logger";
import { EnvelopeCodec } from "../relay/codec";
import {
  HandlerFailureError,
  InvalidPayloadError,
  MissingEndpointError,
  UnknownEndpointError,
} from "../relay/errors";
import type { IncomingCall, RelayListener } from "../relay/listener";

export type HandlerContext<H> = {
  handle: H;
  callId: string;
  signal: AbortSignal;
  log: RelayLogger;
};

export type EndpointHandler<C extends ContractMap, E extends EndpointName<C>, H> = (
  request: RequestOf<C, E>,
  ctx: HandlerContext<H>
) => ResponseOf<C, E> | Promise<ResponseOf<C, E>>;

type ErasedHandler<H> = (request: unknown, ctx: HandlerContext<H>) => Promise<unknown>;

export type DispatchOutcome =
  | { ok: true; payload: Buffer }
  | { ok: false; error: RelayErrorPayload };

type InferenceServerOptions<C extends ContractMap, H> = {
  contracts: C;
  handle: H;
  requiredEndpoints?: ReadonlyArray<EndpointName<C>>;
  log?: RelayLogger;
};

const toErrorPayload = (
  code: RelayErrorPayload["code"],
  error: unknown
): RelayErrorPayload => ({
  code,
  message: error instanceof Error ? error.message : String(error),
  ...(error instanceof Error ? { error_name: error.name } : {}),
});

const whenAborted = (signal: AbortSignal) =>
  new Promise<null>((resolve) => {
    if (signal.aborted) {
      resolve(null);
      return;
    }
    signal.addEventListener("abort", () => resolve(null), { once: true });
  });

/**
 * Hosts user handlers behind named endpoints. The handle is built once before
 * construction and shared read-only by every call; nothing else survives a call.
 */
export class InferenceServer<C extends ContractMap, H> {
  private readonly codec: EnvelopeCodec<C>;
  private readonly handlers = new Map<string, ErasedHandler<H>>();
  private readonly required: ReadonlyArray<EndpointName<C>>;
  private readonly handle: H;
  private readonly log: RelayLogger;
  private listener: RelayListener | null = null;
  private stopped = false;
  private served = 0;

  constructor(opts: InferenceServerOptions<C, H>) {
    this.codec = new EnvelopeCodec(opts.contracts);
    this.required = opts.requiredEndpoints ?? this.codec.endpoints();
    this.handle = opts.handle;
    this.log = opts.log ?? silentLogger;
  }

  get callsServed(): number {
    return this.served;
  }

  register<E extends EndpointName<C>>(endpoint: E, handler: EndpointHandler<C, E, H>): this {
    this.handlers.set(endpoint, async (request, ctx) =>
      handler(this.codec.validate(endpoint, "request", request), ctx)
    );
    return this;
  }

  /** Throws MissingEndpointError when a required endpoint has no handler. */
  validate(): void {
    const missing = this.required.filter((endpoint) => !this.handlers.has(endpoint));
    if (missing.length > 0) {
      this.log.error(
        { evt: "responder.endpoints_missing_fatal", missing },
        "responder.endpoints_missing_fatal"
      );
      throw new MissingEndpointError(missing);
    }
  }

  /**
   * Runs one decoded payload through its handler. Handler faults come back as
   * error payloads so a single bad problem never takes the server down.
   */
  async dispatch(
    endpoint: string,
    payload: Buffer,
    ctx: { callId: string; signal: AbortSignal }
  ): Promise<DispatchOutcome> {
    const handler = this.handlers.get(endpoint);
    if (!this.codec.has(endpoint) || !handler) {
      return { ok: false, error: toErrorPayload("unknown_endpoint", new UnknownEndpointError(endpoint)) };
    }

    let request: unknown;
    try {
      request = JSON.parse(payload.toString("utf8"));
    } catch (error) {
      return { ok: false, error: toErrorPayload("invalid_request", error) };
    }

    let result: unknown;
    try {
      result = await handler(request, {
        handle: this.handle,
        callId: ctx.callId,
        signal: ctx.signal,
        log: this.log,
      });
    } catch (error) {
      if (error instanceof InvalidPayloadError && error.endpoint === endpoint) {
        return { ok: false, error: toErrorPayload("invalid_request", error) };
      }
      this.log.warn(
        { evt: "responder.handler_failed", endpoint, callId: ctx.callId, error: describeError(error) },
        "responder.handler_failed"
      );
      return { ok: false, error: toErrorPayload("handler_failure", error) };
    }

    try {
      const checked = this.codec.validate(endpoint, "response", result);
      return { ok: true, payload: Buffer.from(JSON.stringify(checked), "utf8") };
    } catch (error) {
      this.log.warn(
        { evt: "responder.handler_invalid_response", endpoint, callId: ctx.callId, error: describeError(error) },
        "responder.handler_invalid_response"
      );
      return { ok: false, error: toErrorPayload("invalid_response", error) };
    }
  }

  /** In-process call, used for local debug runs. Failures raise HandlerFailureError. */
  async invoke<E extends EndpointName<C>>(
    endpoint: E,
    request: RequestOf<C, E>,
    signal: AbortSignal = new AbortController().signal
  ): Promise<ResponseOf<C, E>> {
    const payload = Buffer.from(JSON.stringify(request), "utf8");
    const outcome = await this.dispatch(endpoint, payload, { callId: `local-${this.served}`, signal });
    this.served += 1;
    if (!outcome.ok) {
      throw new HandlerFailureError(outcome.error.message, outcome.error.code, outcome.error.error_name);
    }
    return this.codec.validate(endpoint, "response", JSON.parse(outcome.payload.toString("utf8")));
  }

  /**
   * Accepts and answers calls one at a time until stop() or until the
   * listener closes. Handlers get no timeout here; the caller's deadline rules.
   */
  async serve(listener: RelayListener): Promise<void> {
    this.validate();
    this.listener = listener;
    this.log.info(
      { evt: "responder.serving", endpoints: [...this.handlers.keys()] },
      "responder.serving"
    );

    while (!this.stopped) {
      const call = await listener.accept();
      if (!call) break;
      await this.answer(call);
    }

    this.log.info({ evt: "responder.stopped", served: this.served }, "responder.stopped");
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.listener) {
      await this.listener.close();
    }
  }

  private async answer(call: IncomingCall) {
    const startedAt = Date.now();
    // A handler that ignores its signal keeps running, but it no longer holds up the queue.
    const outcome = await Promise.race([
      this.dispatch(call.endpoint, call.payload, { callId: call.callId, signal: call.signal }),
      whenAborted(call.signal),
    ]);
    this.served += 1;

    if (outcome === null || call.signal.aborted) {
      this.log.warn(
        {
          evt: "responder.late_reply_discarded",
          callId: call.callId,
          endpoint: call.endpoint,
          elapsedMs: Date.now() - startedAt,
        },
        "responder.late_reply_discarded"
      );
      return;
    }

    if (outcome.ok) {
      call.respond(outcome.payload);
    } else {
      call.respondError(outcome.error);
    }
    this.log.debug(
      {
        evt: "responder.call_answered",
        callId: call.callId,
        endpoint: call.endpoint,
        ok: outcome.ok,
        elapsedMs: Date.now() - startedAt,
      },
      "responder.call_answered"
    );
  }
}

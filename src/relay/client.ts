import type {
  ContractMap,
  EndpointName,
  RequestOf,
  ResponseOf,
} from "../contracts/endpoints";
import type { RelayLogger } from "../logging/logger";
import { parseRelayAddress } from "./address";
import { type DecodedReply, EnvelopeCodec } from "./codec";
import { type BackoffPolicy, RelayDialer } from "./dialer";
import { CorruptEnvelopeError, HandlerFailureError, InvalidPayloadError } from "./errors";
import { RelayListener } from "./listener";

/** What the gateway needs from a relay: typed calls with a per-call deadline. */
export interface RelayCaller<C extends ContractMap> {
  call<E extends EndpointName<C>>(
    endpoint: E,
    request: RequestOf<C, E>,
    deadlineMs: number
  ): Promise<ResponseOf<C, E>>;
  close(): Promise<void>;
}

export class RelayClient<C extends ContractMap> implements RelayCaller<C> {
  private readonly codec: EnvelopeCodec<C>;

  constructor(
    private readonly dialer: RelayDialer,
    contracts: C
  ) {
    this.codec = new EnvelopeCodec(contracts);
  }

  async call<E extends EndpointName<C>>(
    endpoint: E,
    request: RequestOf<C, E>,
    deadlineMs: number
  ): Promise<ResponseOf<C, E>> {
    const payload = Buffer.from(
      JSON.stringify(this.codec.validate(endpoint, "request", request)),
      "utf8"
    );
    const envelope = await this.dialer.call(endpoint, payload, deadlineMs);

    let reply: DecodedReply<C, E>;
    try {
      reply = this.codec.decodeReply(endpoint, envelope);
    } catch (error) {
      // A reply that breaks the response contract is the handler's fault, not the wire's.
      if (error instanceof InvalidPayloadError) {
        throw new HandlerFailureError(error.message, "invalid_response");
      }
      if (error instanceof CorruptEnvelopeError) throw error;
      throw new CorruptEnvelopeError(`reply for "${endpoint}" could not be decoded`, {
        cause: error,
      });
    }

    if (!reply.ok) {
      throw new HandlerFailureError(reply.error.message, reply.error.code, reply.error.error_name);
    }
    return reply.value;
  }

  close(): Promise<void> {
    return this.dialer.close();
  }
}

type CommonConnectOptions = {
  address: string;
  log?: RelayLogger;
};

export type DialerConnectOptions = CommonConnectOptions & {
  role: "dialer";
  backoff?: Partial<BackoffPolicy>;
  fetchImpl?: typeof fetch;
  sleepImpl?: (ms: number) => Promise<unknown>;
  now?: () => number;
};

export type ListenerConnectOptions = CommonConnectOptions & {
  role: "listener";
  service?: string;
};

/**
 * Opens one end of the relay. The listener is bound and ready for accept();
 * the dialer has seen the listener answer its readiness probe.
 */
export async function connectRelay(opts: ListenerConnectOptions): Promise<RelayListener>;
export async function connectRelay(opts: DialerConnectOptions): Promise<RelayDialer>;
export async function connectRelay(
  opts: ListenerConnectOptions | DialerConnectOptions
): Promise<RelayListener | RelayDialer> {
  const address = parseRelayAddress(opts.address);

  if (opts.role === "listener") {
    const listener = new RelayListener({ address, log: opts.log, service: opts.service });
    await listener.listen();
    return listener;
  }

  const dialer = new RelayDialer({
    address,
    log: opts.log,
    backoff: opts.backoff,
    fetchImpl: opts.fetchImpl,
    sleepImpl: opts.sleepImpl,
    now: opts.now,
  });
  await dialer.connect();
  return dialer;
}

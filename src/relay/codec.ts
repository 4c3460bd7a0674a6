import { randomUUID } from "node:crypto";

import type { z } from "zod";

import {
  ENVELOPE_VERSION,
  RelayErrorPayload,
  WireEnvelope,
  type Envelope,
} from "../contracts/envelope";
import type {
  ContractMap,
  EndpointName,
  RequestOf,
  ResponseOf,
} from "../contracts/endpoints";
import { CorruptEnvelopeError, InvalidPayloadError, UnknownEndpointError } from "./errors";

export function encodeEnvelope(envelope: Envelope): Buffer {
  const wire: WireEnvelope = {
    v: ENVELOPE_VERSION,
    call_id: envelope.callId,
    endpoint: envelope.endpoint,
    is_error: envelope.isError,
    payload: envelope.payload.toString("base64"),
  };
  return Buffer.from(JSON.stringify(wire), "utf8");
}

export function decodeEnvelope(bytes: Uint8Array): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch (error) {
    throw new CorruptEnvelopeError("envelope is not valid JSON", { cause: error });
  }

  const parsed = WireEnvelope.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new CorruptEnvelopeError(`envelope rejected: ${detail}`);
  }

  return {
    callId: parsed.data.call_id,
    endpoint: parsed.data.endpoint,
    isError: parsed.data.is_error,
    payload: Buffer.from(parsed.data.payload, "base64"),
  };
}

export type PayloadKind = "request" | "response";

export type DecodedCall<C extends ContractMap> = {
  callId: string;
  endpoint: EndpointName<C>;
  value: RequestOf<C, EndpointName<C>>;
};

export type DecodedReply<C extends ContractMap, E extends EndpointName<C>> =
  | { callId: string; endpoint: E; ok: true; value: ResponseOf<C, E> }
  | { callId: string; endpoint: E; ok: false; error: RelayErrorPayload };

/**
 * Binds the opaque envelope to a set of endpoint contracts. Payload bytes are
 * the JSON of a value that passed the endpoint's request or response schema.
 */
export class EnvelopeCodec<C extends ContractMap> {
  constructor(private readonly contracts: C) {}

  has(endpoint: string): endpoint is EndpointName<C> {
    return Object.prototype.hasOwnProperty.call(this.contracts, endpoint);
  }

  endpoints(): EndpointName<C>[] {
    return Object.keys(this.contracts).filter((key): key is EndpointName<C> => this.has(key));
  }

  encode<E extends EndpointName<C>>(
    endpoint: E,
    value: RequestOf<C, E>,
    opts?: { kind?: "request"; callId?: string }
  ): Buffer;
  encode<E extends EndpointName<C>>(
    endpoint: E,
    value: ResponseOf<C, E>,
    opts: { kind: "response"; callId: string }
  ): Buffer;
  encode(
    endpoint: EndpointName<C>,
    value: unknown,
    opts: { kind?: PayloadKind; callId?: string } = {}
  ): Buffer {
    const kind = opts.kind ?? "request";
    const checked = this.validate(endpoint, kind, value);
    return encodeEnvelope({
      callId: opts.callId ?? randomUUID(),
      endpoint,
      isError: false,
      payload: Buffer.from(JSON.stringify(checked), "utf8"),
    });
  }

  encodeError(endpoint: string, error: RelayErrorPayload, callId: string): Buffer {
    return encodeEnvelope({
      callId,
      endpoint,
      isError: true,
      payload: Buffer.from(JSON.stringify(RelayErrorPayload.parse(error)), "utf8"),
    });
  }

  /** Decodes a request envelope into its endpoint and typed value. */
  decode(bytes: Uint8Array): DecodedCall<C> {
    const envelope = decodeEnvelope(bytes);
    if (envelope.isError) {
      throw new CorruptEnvelopeError("request envelope is flagged as an error");
    }
    return this.decodeRequest(envelope);
  }

  decodeRequest(envelope: Envelope): DecodedCall<C> {
    const endpoint = envelope.endpoint;
    if (!this.has(endpoint)) {
      throw new UnknownEndpointError(endpoint);
    }
    const value = this.validate(endpoint, "request", parsePayloadJson(envelope));
    return { callId: envelope.callId, endpoint, value };
  }

  decodeReply<E extends EndpointName<C>>(
    endpoint: E,
    envelope: Envelope
  ): DecodedReply<C, E> {
    if (envelope.endpoint !== endpoint) {
      throw new CorruptEnvelopeError(
        `reply tagged "${envelope.endpoint}" does not match endpoint "${endpoint}"`
      );
    }

    const raw = parsePayloadJson(envelope);
    if (envelope.isError) {
      const parsed = RelayErrorPayload.safeParse(raw);
      if (!parsed.success) {
        throw new CorruptEnvelopeError("error envelope payload is malformed");
      }
      return { callId: envelope.callId, endpoint, ok: false, error: parsed.data };
    }

    const value = this.validate(endpoint, "response", raw);
    return { callId: envelope.callId, endpoint, ok: true, value };
  }

  validate<E extends EndpointName<C>, K extends PayloadKind>(
    endpoint: E,
    kind: K,
    value: unknown
  ): z.output<C[E][K]> {
    const contract = this.contracts[endpoint];
    if (!contract) {
      throw new UnknownEndpointError(endpoint);
    }
    const parsed = contract[kind].safeParse(value);
    if (!parsed.success) {
      throw new InvalidPayloadError(
        endpoint,
        kind,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      );
    }
    return parsed.data;
  }
}

function parsePayloadJson(envelope: Envelope): unknown {
  try {
    return JSON.parse(envelope.payload.toString("utf8"));
  } catch (error) {
    throw new CorruptEnvelopeError(`payload for "${envelope.endpoint}" is not valid JSON`, {
      cause: error,
    });
  }
}

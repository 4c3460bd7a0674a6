export type RelayErrorCode =
  | "connection_unavailable"
  | "corrupt_envelope"
  | "handler_failure"
  | "timeout"
  | "transport_broken"
  | "unknown_endpoint"
  | "invalid_payload"
  | "missing_endpoint";

export class RelayError extends Error {
  readonly code: RelayErrorCode;

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
    this.code = code;
  }
}

/** The peer never became reachable within the startup grace period. */
export class ConnectionUnavailableError extends RelayError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super("connection_unavailable", message, options);
    this.name = "ConnectionUnavailableError";
    this.attempts = attempts;
  }
}

export class CorruptEnvelopeError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("corrupt_envelope", message, options);
    this.name = "CorruptEnvelopeError";
  }
}

/** The remote handler raised, or returned something its contract rejects. */
export class HandlerFailureError extends RelayError {
  readonly remoteCode: string;
  readonly remoteName?: string;

  constructor(message: string, remoteCode: string, remoteName?: string) {
    super("handler_failure", message);
    this.name = "HandlerFailureError";
    this.remoteCode = remoteCode;
    this.remoteName = remoteName;
  }
}

export class TimeoutError extends RelayError {
  readonly deadlineMs: number;

  constructor(endpoint: string, deadlineMs: number) {
    super("timeout", `relay call to "${endpoint}" exceeded ${deadlineMs}ms`);
    this.name = "TimeoutError";
    this.deadlineMs = deadlineMs;
  }
}

export class TransportBrokenError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport_broken", message, options);
    this.name = "TransportBrokenError";
  }
}

export class UnknownEndpointError extends RelayError {
  readonly endpoint: string;

  constructor(endpoint: string) {
    super("unknown_endpoint", `unknown endpoint "${endpoint}"`);
    this.name = "UnknownEndpointError";
    this.endpoint = endpoint;
  }
}

export class InvalidPayloadError extends RelayError {
  readonly endpoint: string;
  readonly issues: string[];

  constructor(endpoint: string, kind: string, issues: string[]) {
    super("invalid_payload", `invalid ${kind} payload for "${endpoint}": ${issues.join("; ")}`);
    this.name = "InvalidPayloadError";
    this.endpoint = endpoint;
    this.issues = issues;
  }
}

export class MissingEndpointError extends RelayError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super("missing_endpoint", `required endpoints not registered: ${missing.join(", ")}`);
    this.name = "MissingEndpointError";
    this.missing = missing;
  }
}

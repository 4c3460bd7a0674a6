import { z } from "zod";

export const ENVELOPE_VERSION = 1;
export const RELAY_CALL_PATH = "/relay/call";
export const RELAY_CONTENT_TYPE = "application/octet-stream";

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const WireEnvelope = z
  .object({
    v: z.literal(ENVELOPE_VERSION),
    call_id: z.string().min(1).max(128),
    endpoint: z.string().min(1).max(128),
    is_error: z.boolean(),
    payload: z.string().regex(BASE64, "payload must be base64"),
  })
  .strict();

export type WireEnvelope = z.infer<typeof WireEnvelope>;

// Unit carried by the relay. `payload` is never interpreted below the endpoint codec.
export type Envelope = {
  callId: string;
  endpoint: string;
  payload: Buffer;
  isError: boolean;
};

export const RelayErrorPayload = z.object({
  code: z.enum(["handler_failure", "unknown_endpoint", "invalid_request", "invalid_response"]),
  message: z.string(),
  error_name: z.string().optional(),
});

export type RelayErrorPayload = z.infer<typeof RelayErrorPayload>;

import {
  ExternalServiceError,
  MalformedResponseError,
  ValidationInputError,
  type FieldIssue,
} from "@reelgen/shared";

export type ErrorBody = {
  error: string;
  message?: string;
  details?: FieldIssue[];
};

export type HttpError = { status: number; body: ErrorBody };

/** Maps a thrown error to a response. Upstream messages are logged, never echoed. */
export function toHttpError(err: unknown, fallbackCode: string): HttpError {
  if (err instanceof ValidationInputError)
    return {
      status: 422,
      body: { error: "invalid_request", message: err.message, details: err.issues },
    };
  if (err instanceof ExternalServiceError)
    return err.unavailable
      ? { status: 503, body: { error: `${err.service}_unavailable` } }
      : { status: 502, body: { error: `${err.service}_error` } };
  if (err instanceof MalformedResponseError)
    return { status: 502, body: { error: "llm_malformed_response" } };
  return { status: 500, body: { error: fallbackCode } };
}

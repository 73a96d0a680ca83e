/**
 * HTTP boundary: Outcome → status code and JSON body.
 *
 * Error responses use the envelope
 * `{ error: { code: string, message: string, details?: Record<string, unknown> } }`.
 *
 * | Outcome         | Status                         | Code                   |
 * |-----------------|--------------------------------|------------------------|
 * | dispatched      | 200                            | -                      |
 * | skipped         | 200                            | -                      |
 * | rejected        | 400                            | VALIDATION_ERROR       |
 * | unknown_type    | 400                            | UNKNOWN_MESSAGE_TYPE   |
 * | unprocessable   | by kind (404 / 409 / 422)      | kind, upper-cased      |
 * | failed          | 500 (503 when aborted)         | INTERNAL_ERROR / DISPATCH_ABORTED |
 *
 * Failed responses never carry the error message or stack of an internal
 * error; those stay in the logs.
 */
import type { Outcome } from "../outcomes/types.js";
import { assertNever } from "../types.js";

// =============================================================================
// Error Envelope
// =============================================================================

export type HttpErrorCode =
  | "VALIDATION_ERROR"
  | "UNKNOWN_MESSAGE_TYPE"
  | "INTERNAL_ERROR"
  | "DISPATCH_ABORTED";

export interface ErrorDetail {
  readonly code: HttpErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: HttpErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Responses
// =============================================================================

export type HttpSuccessBody = { result: unknown } | { skipped: true; reason: string };

export interface HttpResponse {
  status: number;
  body: HttpSuccessBody | ErrorEnvelope;
}

export const DEFAULT_STATUS_BY_KIND: Readonly<Record<string, number>> = Object.freeze({
  not_found: 404,
  conflict: 409,
});

export const UNPROCESSABLE_STATUS = 422;

export interface HttpMappingOptions {
  /** Merged over the defaults; kinds not listed map to 422 */
  statusByKind?: Record<string, number>;
}

function statusForKind(kind: string, options: HttpMappingOptions): number {
  return options.statusByKind?.[kind] ?? DEFAULT_STATUS_BY_KIND[kind] ?? UNPROCESSABLE_STATUS;
}

/**
 * Map a dispatch outcome to an HTTP response.
 *
 * @example
 * ```typescript
 * const outcome = await bus.dispatch("Allocate", await request.json());
 * const { status, body } = toHttpResponse(outcome);
 * return new Response(JSON.stringify(body), { status });
 * ```
 */
export function toHttpResponse(outcome: Outcome, options: HttpMappingOptions = {}): HttpResponse {
  switch (outcome.status) {
    case "dispatched":
      return { status: 200, body: { result: outcome.result } };

    case "skipped":
      return { status: 200, body: { skipped: true, reason: outcome.reason } };

    case "rejected":
      return {
        status: 400,
        body: createErrorEnvelope("VALIDATION_ERROR", "Message failed validation", {
          messageType: outcome.messageType,
          fieldErrors: outcome.fieldErrors,
        }),
      };

    case "unknown_type":
      return {
        status: 400,
        body: createErrorEnvelope(
          "UNKNOWN_MESSAGE_TYPE",
          `Unknown message type: ${outcome.messageType}`,
          { messageType: outcome.messageType }
        ),
      };

    case "unprocessable":
      return {
        status: statusForKind(outcome.kind, options),
        body: createErrorEnvelope(outcome.kind.toUpperCase(), outcome.detail, {
          messageType: outcome.messageType,
          kind: outcome.kind,
          ...(outcome.precondition !== undefined && { precondition: outcome.precondition }),
          ...(outcome.context !== undefined && { context: outcome.context }),
        }),
      };

    case "failed": {
      const details = { messageId: outcome.messageId, correlationId: outcome.correlationId };
      if (outcome.error.code === "DISPATCH_ABORTED") {
        return {
          status: 503,
          body: createErrorEnvelope("DISPATCH_ABORTED", "Dispatch aborted", details),
        };
      }
      return {
        status: 500,
        body: createErrorEnvelope("INTERNAL_ERROR", "Internal error", details),
      };
    }

    default:
      return assertNever(outcome);
  }
}

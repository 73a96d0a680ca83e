/**
 * Branded Types for Dispatch Identifiers
 *
 * Both identifiers are plain strings at runtime. The brands stop a
 * correlation id from being passed where a message id is expected.
 *
 * @module
 */

declare const MessageIdBrand: unique symbol;

/**
 * Identifies one dispatch of one message. Follow-up events get their own.
 */
export type MessageId = string & { readonly [MessageIdBrand]: void };

declare const CorrelationIdBrand: unique symbol;

/**
 * Shared by a dispatched message and every follow-up event it raised.
 */
export type CorrelationId = string & { readonly [CorrelationIdBrand]: void };

/**
 * Brand a caller-supplied string as a MessageId.
 *
 * @throws Error if the id is empty
 */
export function toMessageId(id: string): MessageId {
  if (!isValidIdString(id)) {
    throw new Error("Invalid MessageId: must be a non-empty string");
  }
  return id as MessageId;
}

/**
 * Brand a caller-supplied string as a CorrelationId.
 *
 * @throws Error if the id is empty
 */
export function toCorrelationId(id: string): CorrelationId {
  if (!isValidIdString(id)) {
    throw new Error("Invalid CorrelationId: must be a non-empty string");
  }
  return id as CorrelationId;
}

/**
 * Check that a value is a non-empty string. Says nothing about branding.
 */
export function isValidIdString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

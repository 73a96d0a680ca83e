/**
 * Identifier generation.
 *
 * Format: `{prefix}_{uuidv7}`, e.g. `msg_0190a7c4-1234-7abc-8def-1234567890ab`.
 * UUID v7 is time-ordered, so ids sort by creation time in logs.
 */
import { v7 as uuidv7 } from "uuid";
import { toCorrelationId, toMessageId, type CorrelationId, type MessageId } from "./branded.js";

const MESSAGE_ID_PREFIX = "msg";
const CORRELATION_ID_PREFIX = "corr";

export function generateMessageId(): MessageId {
  return toMessageId(`${MESSAGE_ID_PREFIX}_${uuidv7()}`);
}

export function generateCorrelationId(): CorrelationId {
  return toCorrelationId(`${CORRELATION_ID_PREFIX}_${uuidv7()}`);
}

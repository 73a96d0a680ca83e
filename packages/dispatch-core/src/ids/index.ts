export { generateMessageId, generateCorrelationId } from "./generator.js";

export type { MessageId, CorrelationId } from "./branded.js";
export { toMessageId, toCorrelationId, isValidIdString } from "./branded.js";

import type { Logger } from "../logging/types.js";
import type { MessageKind } from "../messages/types.js";
import type { CorrelationId, MessageId } from "../ids/branded.js";

/**
 * Per-invocation context passed to every handler.
 */
export interface HandlerContext {
  messageId: MessageId;
  correlationId: CorrelationId;
  messageType: string;
  /** Aborts when the caller abandons the dispatch or the timeout elapses */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Business logic for one message type.
 *
 * Handlers only ever receive messages that passed syntax validation and
 * every precondition. Throw `UnprocessableError` for semantic failures found
 * mid-handling; anything else thrown is reported as `failed`.
 */
export interface MessageHandler<TMessage = unknown, TUow = unknown, TResult = unknown> {
  readonly name: string;
  handle(message: TMessage, uow: TUow, context: HandlerContext): TResult | Promise<TResult>;
}

export type MessageHandlerFn<TMessage = unknown, TUow = unknown, TResult = unknown> = (
  message: TMessage,
  uow: TUow,
  context: HandlerContext
) => TResult | Promise<TResult>;

/**
 * A handler as stored by the registry. `role` must equal the message kind.
 */
export interface HandlerRegistration<TUow> {
  readonly name: string;
  readonly role: MessageKind;
  readonly handler: MessageHandler<unknown, TUow>;
}

/**
 * Introspection view of one registered handler.
 */
export interface HandlerInfo {
  messageType: string;
  name: string;
  role: MessageKind;
}

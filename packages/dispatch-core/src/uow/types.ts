import type { CorrelationId, MessageId } from "../ids/branded.js";

/**
 * A message raised by domain code during handling, dispatched after commit.
 */
export interface RaisedMessage {
  type: string;
  payload: unknown;
}

/**
 * The transactional boundary handlers read and write through.
 *
 * The bus calls exactly one of `commit()` or `rollback()` per unit of work.
 * `collectNewEvents()` is read only after a successful commit.
 */
export interface UnitOfWork {
  commit(): void | Promise<void>;
  rollback(): void | Promise<void>;
  collectNewEvents?(): Iterable<RaisedMessage>;
}

/**
 * What the factory is told about the scope it opens a unit of work for.
 */
export interface UnitOfWorkScopeInfo {
  messageType: string;
  messageId: MessageId;
  correlationId: CorrelationId;
  /** Set for event handler scopes; commands run in a single scope */
  handler?: string;
}

export type UnitOfWorkFactory<TUow extends UnitOfWork> = (
  scope: UnitOfWorkScopeInfo
) => TUow | Promise<TUow>;

/**
 * ## Unit of Work Scope
 *
 * Opens a unit of work, runs the work against it and guarantees that it is
 * either committed or rolled back on every exit path.
 *
 * | Work result          | Action                 | Returns / throws              |
 * |----------------------|------------------------|-------------------------------|
 * | `{ commit: true }`   | commit, collect events | `{ committed: true, raised }` |
 * | `{ commit: false }`  | rollback               | `{ committed: false }`        |
 * | throws               | rollback               | rethrows the original error   |
 * | commit throws        | rollback               | throws COMMIT_FAILED          |
 *
 * A failing rollback is logged at ERROR and never replaces the original error.
 */
import { DispatchErrors } from "../errors/DispatchError.js";
import type { Logger } from "../logging/types.js";
import type { RaisedMessage, UnitOfWork, UnitOfWorkFactory, UnitOfWorkScopeInfo } from "./types.js";

export interface ScopeWork<T> {
  commit: boolean;
  value: T;
}

export interface ScopeResult<T> {
  value: T;
  committed: boolean;
  /** Events collected from the unit of work after commit */
  raised: RaisedMessage[];
}

function scopeContext(info: UnitOfWorkScopeInfo): Record<string, string> {
  return {
    messageType: info.messageType,
    messageId: info.messageId,
    correlationId: info.correlationId,
    ...(info.handler !== undefined && { handler: info.handler }),
  };
}

async function rollbackQuietly(
  uow: UnitOfWork,
  info: UnitOfWorkScopeInfo,
  logger: Logger
): Promise<void> {
  try {
    await uow.rollback();
  } catch (error) {
    logger.error("Unit of work rollback failed", {
      ...scopeContext(info),
      error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
    });
  }
}

export async function withUnitOfWork<TUow extends UnitOfWork, T>(
  factory: UnitOfWorkFactory<TUow>,
  info: UnitOfWorkScopeInfo,
  work: (uow: TUow) => Promise<ScopeWork<T>>,
  logger: Logger
): Promise<ScopeResult<T>> {
  const uow = await factory(info);

  let done: ScopeWork<T>;
  try {
    done = await work(uow);
  } catch (error) {
    await rollbackQuietly(uow, info, logger);
    throw error;
  }

  if (!done.commit) {
    await rollbackQuietly(uow, info, logger);
    return { value: done.value, committed: false, raised: [] };
  }

  try {
    await uow.commit();
  } catch (error) {
    await rollbackQuietly(uow, info, logger);
    throw DispatchErrors.commitFailed(error, scopeContext(info));
  }

  const raised = uow.collectNewEvents ? Array.from(uow.collectNewEvents()) : [];
  logger.debug("Unit of work committed", { ...scopeContext(info), raisedCount: raised.length });
  return { value: done.value, committed: true, raised };
}

/**
 * Precondition factories.
 *
 * @example
 * ```typescript
 * const productExists = requireThat<Allocate, AllocationUow>({
 *   name: "productExists",
 *   kind: UnprocessableKinds.NOT_FOUND,
 *   test: (cmd, uow) => uow.products.get(cmd.sku) !== undefined,
 *   detail: (cmd) => `Unknown sku ${cmd.sku}`,
 * });
 *
 * const lineNotYetAllocated = skipWhen<Allocate, AllocationUow>({
 *   name: "lineNotYetAllocated",
 *   test: (cmd, uow) => uow.products.get(cmd.sku)?.isAllocated(cmd.orderid) ?? false,
 *   reason: (cmd) => `Order line ${cmd.orderid} is already allocated`,
 * });
 * ```
 */
import type { UnknownRecord } from "../types.js";
import type { Precondition, PreconditionResult } from "./types.js";

type Check<TMessage, TUow, TValue> = (message: TMessage, uow: TUow) => TValue | Promise<TValue>;

type Describe<TMessage> = string | ((message: TMessage) => string);

function describe<TMessage>(text: Describe<TMessage>, message: TMessage): string {
  return typeof text === "function" ? text(message) : text;
}

export function pass(): PreconditionResult {
  return { status: "pass" };
}

export function skip(reason: string): PreconditionResult {
  return { status: "skip", reason };
}

export function unprocessable(
  kind: string,
  detail: string,
  context?: UnknownRecord
): PreconditionResult {
  return context !== undefined
    ? { status: "unprocessable", kind, detail, context }
    : { status: "unprocessable", kind, detail };
}

export function definePrecondition<TMessage, TUow>(config: {
  name: string;
  check: Check<TMessage, TUow, PreconditionResult>;
}): Precondition<TMessage, TUow> {
  const { name, check } = config;
  return {
    name,
    check(message, uow) {
      return check(message, uow);
    },
  };
}

export interface RequireThatConfig<TMessage, TUow> {
  name: string;
  kind: string;
  /** Unprocessable when this returns false */
  test: Check<TMessage, TUow, boolean>;
  detail: Describe<TMessage>;
  context?: (message: TMessage) => UnknownRecord;
}

/**
 * Precondition that is unprocessable unless `test` holds.
 */
export function requireThat<TMessage, TUow>(
  config: RequireThatConfig<TMessage, TUow>
): Precondition<TMessage, TUow> {
  return definePrecondition<TMessage, TUow>({
    name: config.name,
    async check(message, uow) {
      if (await config.test(message, uow)) {
        return pass();
      }
      return unprocessable(
        config.kind,
        describe(config.detail, message),
        config.context?.(message)
      );
    },
  });
}

export interface SkipWhenConfig<TMessage, TUow> {
  name: string;
  /** Skipped when this returns true */
  test: Check<TMessage, TUow, boolean>;
  reason: Describe<TMessage>;
}

/**
 * Precondition that skips the message when `test` holds.
 */
export function skipWhen<TMessage, TUow>(
  config: SkipWhenConfig<TMessage, TUow>
): Precondition<TMessage, TUow> {
  return definePrecondition<TMessage, TUow>({
    name: config.name,
    async check(message, uow) {
      if (await config.test(message, uow)) {
        return skip(describe(config.reason, message));
      }
      return pass();
    },
  });
}

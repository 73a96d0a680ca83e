/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout the @gatehouse/dispatch-core package.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for raw payloads, log data, error context and any object whose
 * structure is unknown at compile time.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * Use in the `default` case so that adding a variant to the union becomes a
 * compile error at every switch that forgot to handle it.
 *
 * @example
 * ```typescript
 * switch (outcome.status) {
 *   case "dispatched":
 *     return 200;
 *   // ...
 *   default:
 *     return assertNever(outcome);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}

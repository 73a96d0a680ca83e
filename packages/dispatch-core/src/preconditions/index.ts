/**
 * Precondition Engine
 *
 * Named, ordered, fail-fast checks evaluated inside the handler's unit of work.
 */
export type {
  PreconditionResult,
  PreconditionStatus,
  Precondition,
  PreconditionVerdict,
} from "./types.js";

export type { RequireThatConfig, SkipWhenConfig } from "./definePrecondition.js";
export {
  pass,
  skip,
  unprocessable,
  definePrecondition,
  requireThat,
  skipWhen,
} from "./definePrecondition.js";

export type { RunPreconditionsOptions } from "./runPreconditions.js";
export { runPreconditions } from "./runPreconditions.js";

export { PreconditionRegistry } from "./PreconditionRegistry.js";

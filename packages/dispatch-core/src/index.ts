/**
 * @gatehouse/dispatch-core
 *
 * Tiered validation and dispatch for commands and events: syntax, then
 * preconditions, then handlers, with a fixed outcome taxonomy for the
 * boundaries.
 */

// Core type aliases
export * from "./types.js";

// Ambient
export * from "./errors/index.js";
export * from "./ids/index.js";
export * from "./logging/index.js";
export * from "./config/index.js";
export * from "./cancellation.js";

// Pipeline
export * from "./messages/index.js";
export * from "./schema/index.js";
export * from "./preconditions/index.js";
export * from "./handlers/index.js";
export * from "./uow/index.js";
export * from "./outcomes/index.js";
export * from "./bus/index.js";

// Transport mapping
export * from "./boundaries/index.js";

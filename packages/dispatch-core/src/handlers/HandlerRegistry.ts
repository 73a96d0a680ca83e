/**
 * Handler registry with command/event cardinality rules.
 *
 * - a command has exactly one handler (checked at registration and by `verify()`)
 * - an event has zero or more, invoked in registration order
 * - handler names are unique within a type
 */
import { ConfigurationError } from "../errors/DispatchError.js";
import type { MessageDefinition } from "../messages/types.js";
import type { SchemaRegistry } from "../schema/SchemaRegistry.js";
import type { HandlerInfo, HandlerRegistration, MessageHandler, MessageHandlerFn } from "./types.js";

/**
 * Wrap a plain function as a MessageHandler.
 *
 * The function's own name is used when it has one.
 */
export function toMessageHandler<TMessage, TUow, TResult>(
  handler: MessageHandler<TMessage, TUow, TResult> | MessageHandlerFn<TMessage, TUow, TResult>,
  fallbackName: string
): MessageHandler<TMessage, TUow, TResult> {
  if (typeof handler !== "function") {
    return handler;
  }
  const fn = handler;
  return {
    name: fn.name !== "" ? fn.name : fallbackName,
    handle(message, uow, context) {
      return fn(message, uow, context);
    },
  };
}

export class HandlerRegistry<TUow> {
  private readonly registrations = new Map<string, Array<HandlerRegistration<TUow>>>();
  private frozen = false;

  /**
   * @throws ConfigurationError on a frozen registry, a role/kind mismatch,
   *   a second command handler or a duplicate name
   */
  register(definition: MessageDefinition, registration: HandlerRegistration<TUow>): void {
    const { type, kind } = definition;
    const context = { messageType: type, handler: registration.name };

    if (this.frozen) {
      throw new ConfigurationError(
        "REGISTRY_FROZEN",
        `Cannot register handler "${registration.name}" for "${type}": the registry is frozen`,
        context
      );
    }

    if (registration.role !== kind) {
      throw new ConfigurationError(
        "ROLE_MISMATCH",
        `Handler "${registration.name}" is registered as ${registration.role} handler but "${type}" is ${kind === "command" ? "a command" : "an event"}`,
        { ...context, role: registration.role, kind }
      );
    }

    const existing = this.registrations.get(type) ?? [];

    const [current] = existing;
    if (kind === "command" && current !== undefined) {
      throw new ConfigurationError(
        "DUPLICATE_COMMAND_HANDLER",
        `Command "${type}" already has handler "${current.name}"`,
        { ...context, existingHandler: current.name }
      );
    }

    if (existing.some((r) => r.name === registration.name)) {
      throw new ConfigurationError(
        "DUPLICATE_HANDLER_NAME",
        `Duplicate handler name "${registration.name}" for "${type}"`,
        context
      );
    }

    existing.push(registration);
    this.registrations.set(type, existing);
  }

  /**
   * Handlers for a type in registration order (empty when none).
   */
  get(type: string): ReadonlyArray<HandlerRegistration<TUow>> {
    return this.registrations.get(type) ?? [];
  }

  has(type: string): boolean {
    return (this.registrations.get(type)?.length ?? 0) > 0;
  }

  /**
   * Number of handlers registered for a type; used to name anonymous handlers.
   */
  count(type: string): number {
    return this.get(type).length;
  }

  list(): HandlerInfo[] {
    const infos: HandlerInfo[] = [];
    for (const [messageType, registrations] of this.registrations) {
      for (const { name, role } of registrations) {
        infos.push({ messageType, name, role });
      }
    }
    return infos;
  }

  /**
   * Check that every registered command has its handler.
   *
   * @throws ConfigurationError listing the commands without one
   */
  verify(schemas: SchemaRegistry): void {
    const missing = schemas
      .listByKind("command")
      .map((info) => info.type)
      .filter((type) => !this.has(type));

    if (missing.length > 0) {
      throw new ConfigurationError(
        "COMMAND_HANDLER_MISSING",
        `No handler registered for command${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`,
        { messageTypes: missing }
      );
    }
  }

  freeze(): void {
    this.frozen = true;
  }
}

/**
 * ## Message Definitions - Static Message Declarations
 *
 * Every message type is declared once, at module load, as a named record of
 * field rules. The definition carries the Zod schema the syntax validator
 * runs; the schema's output is the only way to obtain a message value.
 *
 * Messages are frozen and branded with their type name, so a handler typed
 * for `Allocate` cannot be handed a hand-built object literal.
 *
 * @example
 * ```typescript
 * export const Allocate = defineCommand("Allocate", {
 *   orderid: fields.string({ minLength: 1 }),
 *   sku: fields.string({ minLength: 1 }),
 *   qty: fields.integer({ gt: 0 }),
 * });
 *
 * export type Allocate = MessageOf<typeof Allocate>;
 * // Readonly<{ orderid: string; sku: string; qty: number; type: "Allocate" }> & BRAND<"Allocate">
 * ```
 */
import { z } from "zod";
import { ConfigurationError } from "../errors/DispatchError.js";
import type { FieldShape } from "./fields.js";
import type { MessageDefinition, MessageKind } from "./types.js";

/** Reserved: every message carries its type name under this key. */
export const TYPE_FIELD = "type";

const PAYLOAD_PARAMS = {
  required_error: "expected object",
  invalid_type_error: "expected object",
} as const;

function buildMessageSchema<TType extends string, TShape extends FieldShape>(
  type: TType,
  shape: TShape
) {
  return z
    .object(shape, PAYLOAD_PARAMS)
    .transform((values) => ({ ...values, type }))
    .readonly()
    .brand<TType>();
}

/**
 * The schema type produced for a message declared with `TShape`.
 */
export type MessageSchema<TType extends string, TShape extends FieldShape> = ReturnType<
  typeof buildMessageSchema<TType, TShape>
>;

export interface DefineMessageOptions {
  description?: string;
}

/**
 * Declare a message type.
 *
 * @throws ConfigurationError if the type name is empty or a field is named `type`
 */
export function defineMessage<
  TType extends string,
  TKind extends MessageKind,
  TShape extends FieldShape,
>(
  type: TType,
  kind: TKind,
  shape: TShape,
  options: DefineMessageOptions = {}
): MessageDefinition<TType, TKind, MessageSchema<TType, TShape>> {
  if (type.trim() === "") {
    throw new ConfigurationError("INVALID_MESSAGE_TYPE", "Message type name cannot be empty");
  }
  if (Object.hasOwn(shape, TYPE_FIELD)) {
    throw new ConfigurationError(
      "RESERVED_FIELD_NAME",
      `Message "${type}" declares a field named "${TYPE_FIELD}", which is reserved for the type name`,
      { messageType: type }
    );
  }

  const definition: MessageDefinition<TType, TKind, MessageSchema<TType, TShape>> = {
    type,
    kind,
    fieldNames: Object.freeze(Object.keys(shape)),
    schema: buildMessageSchema(type, shape),
  };
  if (options.description !== undefined) {
    return Object.freeze({ ...definition, description: options.description });
  }
  return Object.freeze(definition);
}

/**
 * Declare a command: an imperative request handled by exactly one handler.
 */
export function defineCommand<TType extends string, TShape extends FieldShape>(
  type: TType,
  shape: TShape,
  options?: DefineMessageOptions
): MessageDefinition<TType, "command", MessageSchema<TType, TShape>> {
  return defineMessage(type, "command", shape, options);
}

/**
 * Declare an event: a notification fanned out to zero or more handlers.
 */
export function defineEvent<TType extends string, TShape extends FieldShape>(
  type: TType,
  shape: TShape,
  options?: DefineMessageOptions
): MessageDefinition<TType, "event", MessageSchema<TType, TShape>> {
  return defineMessage(type, "event", shape, options);
}

import type { z } from "zod";

/**
 * Commands have exactly one handler; events fan out to zero or more.
 */
export type MessageKind = "command" | "event";

/**
 * Static declaration of one message type.
 */
export interface MessageDefinition<
  TType extends string = string,
  TKind extends MessageKind = MessageKind,
  TSchema extends z.ZodTypeAny = z.ZodTypeAny,
> {
  readonly type: TType;
  readonly kind: TKind;
  /** Field names in declaration order */
  readonly fieldNames: readonly string[];
  readonly description?: string;
  /** Parses a raw payload into the frozen, branded message value */
  readonly schema: TSchema;
}

/**
 * The validated message type produced by a definition.
 */
export type MessageOf<TDefinition extends MessageDefinition> = z.output<TDefinition["schema"]>;

/**
 * A per-field syntax failure. `field` is the dotted path into the payload,
 * or `"payload"` when the payload itself is not an object.
 */
export interface FieldError {
  readonly field: string;
  readonly reason: string;
}

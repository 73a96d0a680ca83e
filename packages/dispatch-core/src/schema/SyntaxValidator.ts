/**
 * ## Syntax Validator - Raw Payload to Typed Message
 *
 * The first tier of the pipeline. Parses an untyped payload against the
 * registered definition and either produces the frozen message value or
 * reports every failing field at once.
 *
 * Reporting rules:
 * - one error per field, the first rule that failed
 * - fields reported in declaration order
 * - a payload that is not an object reports `{ field: "payload", reason: "expected object" }`
 * - unknown fields are dropped, never reported
 */
import type { z } from "zod";
import { UnknownMessageTypeError } from "../errors/DispatchError.js";
import type { FieldError, MessageDefinition, MessageOf } from "../messages/types.js";
import type { SchemaRegistry } from "./SchemaRegistry.js";

/** Field name reported when the payload itself has the wrong shape */
export const PAYLOAD_FIELD = "payload";

export type SyntaxResult<TMessage> =
  | { valid: true; message: TMessage }
  | { valid: false; errors: FieldError[] };

/**
 * Collapse Zod issues to one FieldError per dotted path, keeping the first.
 * Issues about the value as a whole are reported under `rootField`.
 */
export function toFieldErrors(
  issues: readonly z.ZodIssue[],
  rootField: string = PAYLOAD_FIELD
): FieldError[] {
  const errors: FieldError[] = [];
  const seen = new Set<string>();

  for (const issue of issues) {
    const field = issue.path.length > 0 ? issue.path.join(".") : rootField;
    if (seen.has(field)) {
      continue;
    }
    seen.add(field);
    errors.push({ field, reason: issue.message });
  }

  return errors;
}

/**
 * Validate a raw payload against one definition.
 *
 * @example
 * ```typescript
 * const result = validateSyntax(Allocate, { orderid: "o1", sku: "LAMP", qty: -1 });
 * // { valid: false, errors: [{ field: "qty", reason: "must be > 0" }] }
 * ```
 */
export function validateSyntax<TDefinition extends MessageDefinition>(
  definition: TDefinition,
  raw: unknown
): SyntaxResult<MessageOf<TDefinition>> {
  const parsed = definition.schema.safeParse(raw);
  if (parsed.success) {
    return { valid: true, message: parsed.data };
  }
  return { valid: false, errors: toFieldErrors(parsed.error.issues) };
}

/**
 * Validates payloads by type name through a schema registry.
 */
export class SyntaxValidator {
  constructor(private readonly schemas: SchemaRegistry) {}

  /**
   * @throws UnknownMessageTypeError if no schema is registered for `type`
   */
  validate(type: string, raw: unknown): SyntaxResult<MessageOf<MessageDefinition>> {
    const definition = this.schemas.get(type);
    if (!definition) {
      throw new UnknownMessageTypeError(type);
    }
    return validateSyntax(definition, raw);
  }
}

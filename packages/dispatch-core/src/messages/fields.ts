/**
 * Field rule vocabulary.
 *
 * Each rule is a Zod schema whose issue messages are the reasons reported in
 * `FieldError.reason`: "is required", "expected <type>", or the violated
 * predicate ("must be > 0", "must be at most 40 characters", ...).
 * Numeric and boolean rules accept their string spellings, so payloads
 * decoded from query strings or form posts validate the same as JSON.
 * Only decimal spellings count as numbers, and a date must exist on the
 * calendar; anything else is reported as the expected type.
 */
import { z } from "zod";

export const REQUIRED_REASON = "is required";

/**
 * Any Zod schema can be used as a field rule; these helpers only fix the messages.
 */
export type FieldRule = z.ZodTypeAny;

export type FieldShape = Record<string, FieldRule>;

export interface NumberRules {
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

export interface StringRules {
  minLength?: number;
  maxLength?: number;
  pattern?: RegExp;
}

export interface ListRules {
  minItems?: number;
  maxItems?: number;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?)?$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function typeParams(expected: string): { required_error: string; invalid_type_error: string } {
  return { required_error: REQUIRED_REASON, invalid_type_error: `expected ${expected}` };
}

function coerceNumeric(value: unknown): unknown {
  return typeof value === "string" && DECIMAL.test(value) ? Number(value) : value;
}

function coerceBoolean(value: unknown): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  return value;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function coerceDate(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const match = ISO_DATE.exec(value);
  if (!match || !isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return value;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date;
}

function withBounds(schema: z.ZodNumber, rules: NumberRules): z.ZodNumber {
  let bounded = schema;
  if (rules.gt !== undefined) {
    bounded = bounded.gt(rules.gt, { message: `must be > ${rules.gt}` });
  }
  if (rules.gte !== undefined) {
    bounded = bounded.gte(rules.gte, { message: `must be >= ${rules.gte}` });
  }
  if (rules.lt !== undefined) {
    bounded = bounded.lt(rules.lt, { message: `must be < ${rules.lt}` });
  }
  if (rules.lte !== undefined) {
    bounded = bounded.lte(rules.lte, { message: `must be <= ${rules.lte}` });
  }
  return bounded;
}

function withLength(schema: z.ZodString, rules: StringRules): z.ZodString {
  let constrained = schema;
  if (rules.minLength !== undefined) {
    constrained = constrained.min(rules.minLength, {
      message: `must be at least ${rules.minLength} characters`,
    });
  }
  if (rules.maxLength !== undefined) {
    constrained = constrained.max(rules.maxLength, {
      message: `must be at most ${rules.maxLength} characters`,
    });
  }
  if (rules.pattern !== undefined) {
    constrained = constrained.regex(rules.pattern, {
      message: `must match pattern ${rules.pattern.source}`,
    });
  }
  return constrained;
}

/**
 * Field rule factories.
 *
 * @example
 * ```typescript
 * const Allocate = defineCommand("Allocate", {
 *   orderid: fields.string({ minLength: 1 }),
 *   sku: fields.string({ minLength: 1, maxLength: 255 }),
 *   qty: fields.integer({ gt: 0 }),
 * });
 * ```
 */
export const fields = {
  string(rules: StringRules = {}) {
    return withLength(z.string(typeParams("string")), rules);
  },

  integer(rules: NumberRules = {}) {
    const integer = z
      .number(typeParams("integer"))
      .int({ message: "expected integer" })
      .safe({ message: "expected integer" });
    return z.preprocess(coerceNumeric, withBounds(integer, rules));
  },

  number(rules: NumberRules = {}) {
    const finite = z.number(typeParams("number")).finite({ message: "expected number" });
    return z.preprocess(coerceNumeric, withBounds(finite, rules));
  },

  boolean() {
    return z.preprocess(coerceBoolean, z.boolean(typeParams("boolean")));
  },

  /**
   * ISO-8601 date or date-time string, parsed into a Date.
   */
  isoDate() {
    return z.preprocess(coerceDate, z.date(typeParams("ISO-8601 date")));
  },

  oneOf<const TValues extends readonly [string, ...string[]]>(values: TValues) {
    const expected = `expected one of: ${values.join(", ")}`;
    return z.enum(values, {
      errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined ? REQUIRED_REASON : expected,
      }),
    });
  },

  optional<TRule extends FieldRule>(rule: TRule) {
    return rule.optional();
  },

  list<TRule extends FieldRule>(rule: TRule, rules: ListRules = {}) {
    let list = z.array(rule, typeParams("list"));
    if (rules.minItems !== undefined) {
      list = list.min(rules.minItems, { message: `must have at least ${rules.minItems} items` });
    }
    if (rules.maxItems !== undefined) {
      list = list.max(rules.maxItems, { message: `must have at most ${rules.maxItems} items` });
    }
    return list.readonly();
  },
} as const;

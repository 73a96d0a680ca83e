/**
 * Unit tests for message definitions and the field rule vocabulary.
 */
import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  defineCommand,
  defineEvent,
  defineMessage,
  fields,
  validateSyntax,
} from "../../../src/index.js";
import { thrownBy } from "../../support/ledger.js";

const RegisterDevice = defineCommand(
  "RegisterDevice",
  {
    serial: fields.string({ minLength: 3, maxLength: 8, pattern: /^[A-Z0-9]+$/ }),
    slots: fields.integer({ gte: 1, lte: 4 }),
    weight: fields.number({ gt: 0 }),
    active: fields.boolean(),
    installedAt: fields.isoDate(),
    tier: fields.oneOf(["basic", "pro"]),
    tags: fields.list(fields.string({ minLength: 1 }), { maxItems: 2 }),
    notes: fields.optional(fields.string()),
  },
  { description: "Adds a device to the fleet" }
);

const valid = {
  serial: "AB12",
  slots: 2,
  weight: 1.5,
  active: true,
  installedAt: "2024-03-01",
  tier: "pro",
  tags: ["edge"],
};

function errorsFor(raw: unknown) {
  const result = validateSyntax(RegisterDevice, raw);
  return result.valid ? [] : result.errors;
}

describe("defineMessage", () => {
  it("records type, kind, field names and description", () => {
    expect(RegisterDevice.type).toBe("RegisterDevice");
    expect(RegisterDevice.kind).toBe("command");
    expect(RegisterDevice.fieldNames).toEqual([
      "serial",
      "slots",
      "weight",
      "active",
      "installedAt",
      "tier",
      "tags",
      "notes",
    ]);
    expect(RegisterDevice.description).toBe("Adds a device to the fleet");
    expect(Object.isFrozen(RegisterDevice)).toBe(true);
  });

  it("declares events with defineEvent", () => {
    expect(defineEvent("DeviceRegistered", { serial: fields.string() }).kind).toBe("event");
  });

  it("rejects an empty type name", () => {
    const error = thrownBy(() => defineMessage("  ", "command", {}));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "INVALID_MESSAGE_TYPE" });
  });

  it("reserves the 'type' field", () => {
    const error = thrownBy(() => defineEvent("Tagged", { type: fields.string() }));

    expect(error).toMatchObject({
      code: "RESERVED_FIELD_NAME",
      message: 'Message "Tagged" declares a field named "type", which is reserved for the type name',
    });
  });
});

describe("validateSyntax", () => {
  it("produces a frozen message carrying its type name", () => {
    const result = validateSyntax(RegisterDevice, valid);

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.message.type).toBe("RegisterDevice");
    expect(result.message.installedAt).toEqual(new Date("2024-03-01"));
    expect(result.message.notes).toBeUndefined();
    expect(Object.isFrozen(result.message)).toBe(true);
  });

  it("accepts the string spellings of numbers, booleans and dates", () => {
    const result = validateSyntax(RegisterDevice, {
      ...valid,
      slots: "3",
      weight: "0.25",
      active: "false",
      installedAt: "2024-03-01T10:30:00Z",
    });

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.message.slots).toBe(3);
    expect(result.message.weight).toBe(0.25);
    expect(result.message.active).toBe(false);
    expect(result.message.installedAt.toISOString()).toBe("2024-03-01T10:30:00.000Z");
  });

  it("drops unknown fields", () => {
    const result = validateSyntax(RegisterDevice, { ...valid, colour: "red" });

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(Object.keys(result.message)).not.toContain("colour");
  });

  it("reports every missing field as required, in declaration order", () => {
    expect(errorsFor({})).toEqual([
      { field: "serial", reason: "is required" },
      { field: "slots", reason: "is required" },
      { field: "weight", reason: "is required" },
      { field: "active", reason: "is required" },
      { field: "installedAt", reason: "is required" },
      { field: "tier", reason: "is required" },
      { field: "tags", reason: "is required" },
    ]);
  });

  it("reports wrong types", () => {
    expect(
      errorsFor({
        ...valid,
        serial: 12,
        slots: "many",
        active: "yes",
        installedAt: "soon",
        tier: "gold",
        tags: "edge",
      })
    ).toEqual([
      { field: "serial", reason: "expected string" },
      { field: "slots", reason: "expected integer" },
      { field: "active", reason: "expected boolean" },
      { field: "installedAt", reason: "expected ISO-8601 date" },
      { field: "tier", reason: "expected one of: basic, pro" },
      { field: "tags", reason: "expected list" },
    ]);
  });

  it("reports the violated bound", () => {
    expect(errorsFor({ ...valid, slots: 5, weight: 0 })).toEqual([
      { field: "slots", reason: "must be <= 4" },
      { field: "weight", reason: "must be > 0" },
    ]);
    expect(errorsFor({ ...valid, slots: 2.5 })).toEqual([
      { field: "slots", reason: "expected integer" },
    ]);
  });

  it("rejects integers that cannot be represented exactly", () => {
    expect(errorsFor({ ...valid, slots: "9007199254740993" })).toEqual([
      { field: "slots", reason: "expected integer" },
    ]);
    expect(errorsFor({ ...valid, slots: 9007199254740993 })).toEqual([
      { field: "slots", reason: "expected integer" },
    ]);
  });

  it("only reads decimal spellings as numbers", () => {
    expect(errorsFor({ ...valid, slots: "0x1A", weight: "0x1A" })).toEqual([
      { field: "slots", reason: "expected integer" },
      { field: "weight", reason: "expected number" },
    ]);
    expect(errorsFor({ ...valid, slots: " 3" })).toEqual([
      { field: "slots", reason: "expected integer" },
    ]);
  });

  it("rejects dates that do not exist on the calendar", () => {
    expect(errorsFor({ ...valid, installedAt: "2024-02-30" })).toEqual([
      { field: "installedAt", reason: "expected ISO-8601 date" },
    ]);
    expect(errorsFor({ ...valid, installedAt: "2023-02-29T08:00:00Z" })).toEqual([
      { field: "installedAt", reason: "expected ISO-8601 date" },
    ]);
    expect(errorsFor({ ...valid, installedAt: "2024-02-29" })).toEqual([]);
  });

  it("reports one error per field, the first rule that failed", () => {
    expect(errorsFor({ ...valid, serial: "a" })).toEqual([
      { field: "serial", reason: "must be at least 3 characters" },
    ]);
    expect(errorsFor({ ...valid, serial: "ABCDEFGHIJ" })).toEqual([
      { field: "serial", reason: "must be at most 8 characters" },
    ]);
  });

  it("reports list items by index and list length", () => {
    expect(errorsFor({ ...valid, tags: ["ok", ""] })).toEqual([
      { field: "tags.1", reason: "must be at least 1 characters" },
    ]);
    expect(errorsFor({ ...valid, tags: ["a", "b", "c"] })).toEqual([
      { field: "tags", reason: "must have at most 2 items" },
    ]);
  });

  it("reports a payload that is not an object", () => {
    expect(errorsFor(null)).toEqual([{ field: "payload", reason: "expected object" }]);
    expect(errorsFor(undefined)).toEqual([{ field: "payload", reason: "expected object" }]);
  });
});

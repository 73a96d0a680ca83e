export type { MessageKind, MessageDefinition, MessageOf, FieldError } from "./types.js";

export type { FieldRule, FieldShape, NumberRules, StringRules, ListRules } from "./fields.js";
export { fields, REQUIRED_REASON } from "./fields.js";

export type { DefineMessageOptions, MessageSchema } from "./defineMessage.js";
export { defineMessage, defineCommand, defineEvent, TYPE_FIELD } from "./defineMessage.js";

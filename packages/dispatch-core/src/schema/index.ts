export type { SchemaInfo } from "./SchemaRegistry.js";
export { SchemaRegistry } from "./SchemaRegistry.js";

export type { SyntaxResult } from "./SyntaxValidator.js";
export { SyntaxValidator, validateSyntax, toFieldErrors, PAYLOAD_FIELD } from "./SyntaxValidator.js";

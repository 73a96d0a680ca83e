/**
 * Central registry for message definitions.
 *
 * Provides:
 * - Type name lookup
 * - Discovery/introspection APIs
 * - Duplicate detection
 * - Freezing once the bus is built
 */
import { ConfigurationError } from "../errors/DispatchError.js";
import type { MessageDefinition, MessageKind } from "../messages/types.js";

/**
 * Introspection view of a registered definition.
 */
export interface SchemaInfo {
  type: string;
  kind: MessageKind;
  fieldNames: readonly string[];
  description?: string;
}

function toSchemaInfo(definition: MessageDefinition): SchemaInfo {
  const info: SchemaInfo = {
    type: definition.type,
    kind: definition.kind,
    fieldNames: definition.fieldNames,
  };
  if (definition.description !== undefined) {
    info.description = definition.description;
  }
  return info;
}

/**
 * Type name → message definition.
 *
 * Unlike a module-level singleton, each bus owns its registry, so tests can
 * build as many buses as they like without resetting global state.
 */
export class SchemaRegistry {
  private readonly definitions = new Map<string, MessageDefinition>();
  private frozen = false;

  /**
   * @throws ConfigurationError if the type is already registered or the registry is frozen
   */
  register(definition: MessageDefinition): void {
    this.assertNotFrozen(definition.type);
    if (this.definitions.has(definition.type)) {
      throw new ConfigurationError(
        "DUPLICATE_SCHEMA",
        `Duplicate schema registration: "${definition.type}" is already registered`,
        { messageType: definition.type }
      );
    }
    this.definitions.set(definition.type, definition);
  }

  get(type: string): MessageDefinition | undefined {
    return this.definitions.get(type);
  }

  has(type: string): boolean {
    return this.definitions.has(type);
  }

  /**
   * List registered definitions in registration order.
   */
  list(): SchemaInfo[] {
    return Array.from(this.definitions.values()).map(toSchemaInfo);
  }

  listByKind(kind: MessageKind): SchemaInfo[] {
    return this.list().filter((info) => info.kind === kind);
  }

  size(): number {
    return this.definitions.size;
  }

  freeze(): void {
    this.frozen = true;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private assertNotFrozen(type: string): void {
    if (this.frozen) {
      throw new ConfigurationError(
        "REGISTRY_FROZEN",
        `Cannot register schema "${type}": the registry is frozen`,
        { messageType: type }
      );
    }
  }
}

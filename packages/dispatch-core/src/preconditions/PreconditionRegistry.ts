import { ConfigurationError } from "../errors/DispatchError.js";
import type { Precondition } from "./types.js";

/**
 * Type name → ordered preconditions.
 *
 * Schema existence is checked by the bus builder, which owns both registries.
 */
export class PreconditionRegistry<TUow> {
  private readonly preconditions = new Map<string, Array<Precondition<unknown, TUow>>>();
  private frozen = false;

  /**
   * @throws ConfigurationError if the registry is frozen or the name is taken for this type
   */
  register(type: string, precondition: Precondition<unknown, TUow>): void {
    if (this.frozen) {
      throw new ConfigurationError(
        "REGISTRY_FROZEN",
        `Cannot register precondition "${precondition.name}" for "${type}": the registry is frozen`,
        { messageType: type, precondition: precondition.name }
      );
    }

    const existing = this.preconditions.get(type) ?? [];
    if (existing.some((p) => p.name === precondition.name)) {
      throw new ConfigurationError(
        "DUPLICATE_PRECONDITION",
        `Duplicate precondition "${precondition.name}" for "${type}"`,
        { messageType: type, precondition: precondition.name }
      );
    }

    existing.push(precondition);
    this.preconditions.set(type, existing);
  }

  /**
   * Preconditions for a type in registration order (empty when none).
   */
  get(type: string): ReadonlyArray<Precondition<unknown, TUow>> {
    return this.preconditions.get(type) ?? [];
  }

  names(type: string): string[] {
    return this.get(type).map((p) => p.name);
  }

  freeze(): void {
    this.frozen = true;
  }
}

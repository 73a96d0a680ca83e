/**
 * Registration API for the message bus.
 *
 * Every registration mistake is a ConfigurationError thrown here, at
 * startup. A bus that built successfully never reports one at dispatch.
 *
 * @example
 * ```typescript
 * const bus = createMessageBusBuilder<AllocationUow>({ unitOfWork: (scope) => store.begin(scope) })
 *   .registerSchema(CreateBatch)
 *   .registerPrecondition(CreateBatch, batchIsNew)
 *   .registerHandler(CreateBatch, addBatch, "command")
 *   .build();
 * ```
 */
import { type BusConfig, type BusConfigOverrides, resolveBusConfig } from "../config/index.js";
import { ConfigurationError } from "../errors/DispatchError.js";
import { HandlerRegistry, toMessageHandler } from "../handlers/HandlerRegistry.js";
import type { MessageHandler, MessageHandlerFn } from "../handlers/types.js";
import { createScopedLogger } from "../logging/scoped.js";
import type { Logger } from "../logging/types.js";
import { defineMessage } from "../messages/defineMessage.js";
import type { FieldShape } from "../messages/fields.js";
import type { MessageDefinition, MessageKind, MessageOf } from "../messages/types.js";
import { PreconditionRegistry } from "../preconditions/PreconditionRegistry.js";
import type { Precondition } from "../preconditions/types.js";
import { SchemaRegistry } from "../schema/SchemaRegistry.js";
import type { UnitOfWork, UnitOfWorkFactory } from "../uow/types.js";
import { MessageBus } from "./MessageBus.js";

export interface MessageBusBuilderOptions<TUow extends UnitOfWork> {
  unitOfWork: UnitOfWorkFactory<TUow>;
  /** Defaults to a scoped "Bus" console logger at the configured level */
  logger?: Logger;
  /** Merged onto the defaults; pass `loadBusConfig()` to read the environment */
  config?: BusConfigOverrides;
}

export class MessageBusBuilder<TUow extends UnitOfWork> {
  private readonly schemas = new SchemaRegistry();
  private readonly preconditions = new PreconditionRegistry<TUow>();
  private readonly handlers = new HandlerRegistry<TUow>();
  private readonly unitOfWork: UnitOfWorkFactory<TUow>;
  private readonly logger: Logger;
  private readonly config: BusConfig;
  private built = false;

  constructor(options: MessageBusBuilderOptions<TUow>) {
    this.config = resolveBusConfig(options.config);
    this.unitOfWork = options.unitOfWork;
    this.logger = options.logger ?? createScopedLogger("Bus", this.config.logLevel);
  }

  /**
   * Register a message definition, or declare one ad hoc from a field shape.
   */
  registerSchema(definition: MessageDefinition): this;
  registerSchema(type: string, shape: FieldShape, kind: MessageKind): this;
  registerSchema(
    definitionOrType: MessageDefinition | string,
    shape?: FieldShape,
    kind?: MessageKind
  ): this {
    const type = typeof definitionOrType === "string" ? definitionOrType : definitionOrType.type;
    this.assertNotBuilt("schema", type);

    if (typeof definitionOrType !== "string") {
      this.schemas.register(definitionOrType);
      return this;
    }
    if (shape === undefined || kind === undefined) {
      throw new ConfigurationError(
        "INVALID_SCHEMA",
        `Ad-hoc schema "${type}" needs both a field shape and a kind`,
        { messageType: type }
      );
    }
    this.schemas.register(defineMessage(type, kind, shape));
    return this;
  }

  /**
   * Append a precondition for a registered type. Preconditions run in
   * registration order.
   */
  registerPrecondition<TDefinition extends MessageDefinition>(
    definition: TDefinition,
    precondition: Precondition<MessageOf<TDefinition>, TUow>
  ): this;
  registerPrecondition(type: string, precondition: Precondition<unknown, TUow>): this;
  registerPrecondition(
    definitionOrType: MessageDefinition | string,
    precondition: Precondition<unknown, TUow>
  ): this {
    const definition = this.resolveDefinition(definitionOrType, "precondition");
    this.preconditions.register(definition.type, precondition);
    return this;
  }

  /**
   * Register a handler. `role` must match the message kind: a command takes
   * exactly one, an event any number.
   *
   * Plain functions are named after themselves, or `<type>#<n>` when anonymous.
   */
  registerHandler<TDefinition extends MessageDefinition>(
    definition: TDefinition,
    handler:
      | MessageHandler<MessageOf<TDefinition>, TUow>
      | MessageHandlerFn<MessageOf<TDefinition>, TUow>,
    role: MessageKind
  ): this;
  registerHandler(
    type: string,
    handler: MessageHandler<unknown, TUow> | MessageHandlerFn<unknown, TUow>,
    role: MessageKind
  ): this;
  registerHandler(
    definitionOrType: MessageDefinition | string,
    handler: MessageHandler<unknown, TUow> | MessageHandlerFn<unknown, TUow>,
    role: MessageKind
  ): this {
    const definition = this.resolveDefinition(definitionOrType, "handler");
    const resolved = toMessageHandler(
      handler,
      `${definition.type}#${this.handlers.count(definition.type) + 1}`
    );
    this.handlers.register(definition, { name: resolved.name, role, handler: resolved });
    return this;
  }

  /**
   * Validate the registrations, freeze the registries and create the bus.
   *
   * @throws ConfigurationError if a command has no handler, or on a second call
   */
  build(): MessageBus<TUow> {
    if (this.built) {
      throw new ConfigurationError("BUS_ALREADY_BUILT", "The bus has already been built");
    }
    this.handlers.verify(this.schemas);

    this.schemas.freeze();
    this.preconditions.freeze();
    this.handlers.freeze();
    this.built = true;

    this.logger.debug("Message bus built", {
      messageTypes: this.schemas.size(),
      handlers: this.handlers.list().length,
    });

    return new MessageBus<TUow>({
      schemas: this.schemas,
      preconditions: this.preconditions,
      handlers: this.handlers,
      unitOfWork: this.unitOfWork,
      logger: this.logger,
      config: this.config,
    });
  }

  private resolveDefinition(
    definitionOrType: MessageDefinition | string,
    what: "precondition" | "handler"
  ): MessageDefinition {
    const type = typeof definitionOrType === "string" ? definitionOrType : definitionOrType.type;
    this.assertNotBuilt(what, type);

    const registered = this.schemas.get(type);
    if (!registered) {
      throw new ConfigurationError(
        "SCHEMA_NOT_REGISTERED",
        `Cannot register ${what} for "${type}": no schema is registered for it`,
        { messageType: type }
      );
    }
    if (typeof definitionOrType !== "string" && definitionOrType !== registered) {
      throw new ConfigurationError(
        "SCHEMA_MISMATCH",
        `Cannot register ${what} for "${type}": the definition differs from the registered schema`,
        { messageType: type }
      );
    }
    return registered;
  }

  private assertNotBuilt(what: string, type: string): void {
    if (this.built) {
      throw new ConfigurationError(
        "BUS_ALREADY_BUILT",
        `Cannot register ${what} for "${type}": the bus has already been built`,
        { messageType: type }
      );
    }
  }
}

export function createMessageBusBuilder<TUow extends UnitOfWork>(
  options: MessageBusBuilderOptions<TUow>
): MessageBusBuilder<TUow> {
  return new MessageBusBuilder(options);
}

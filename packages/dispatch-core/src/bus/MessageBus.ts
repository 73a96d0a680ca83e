/**
 * ## Message Bus - Tiered Validation and Dispatch
 *
 * Routes an untyped payload through the tiers in a fixed order:
 *
 * ```
 * resolve type ──► syntax ──► open unit of work ──► preconditions ──► handler(s) ──► commit
 *      │             │                                  │                 │             │
 *  unknown_type   rejected                     skipped / unprocessable   failed      failed
 * ```
 *
 * A rejected payload never opens a unit of work. A command runs its single
 * handler in one unit of work. An event runs each handler in its own unit of
 * work, preconditions included, so one handler's failure never rolls back
 * another's effects.
 *
 * After a commit, events collected from the unit of work are dispatched
 * through the same pipeline, breadth-first, and attached to the raising
 * outcome's `followUps`.
 *
 * The bus holds no state besides its frozen registries and may be called
 * concurrently; each call opens its own units of work.
 */
import { z } from "zod";
import { createCancellation, raceAbort, throwIfAborted } from "../cancellation.js";
import type { BusConfig } from "../config/index.js";
import { DispatchError, DispatchErrors, ErrorCategory } from "../errors/DispatchError.js";
import { UnprocessableError } from "../errors/UnprocessableError.js";
import type { HandlerRegistry } from "../handlers/HandlerRegistry.js";
import type { HandlerContext, HandlerRegistration } from "../handlers/types.js";
import { isValidIdString, toCorrelationId, toMessageId } from "../ids/branded.js";
import type { CorrelationId, MessageId } from "../ids/branded.js";
import { generateCorrelationId, generateMessageId } from "../ids/generator.js";
import {
  type DispatchLogContext,
  logDispatchStart,
  logDispatched,
  logFailed,
  logRejected,
  logSkipped,
  logUnknownType,
  logUnprocessable,
} from "../logging/dispatch.js";
import type { Logger } from "../logging/types.js";
import { fields } from "../messages/fields.js";
import type { FieldError, MessageDefinition } from "../messages/types.js";
import {
  type OutcomeIdentity,
  commandOutcome,
  eventOutcome,
  failedOutcome,
  rejectedOutcome,
  unknownTypeOutcome,
} from "../outcomes/factories.js";
import type { HandlerReport, Outcome } from "../outcomes/types.js";
import type { PreconditionRegistry } from "../preconditions/PreconditionRegistry.js";
import { runPreconditions } from "../preconditions/runPreconditions.js";
import type { Precondition, PreconditionVerdict } from "../preconditions/types.js";
import type { SchemaInfo, SchemaRegistry } from "../schema/SchemaRegistry.js";
import { toFieldErrors, validateSyntax } from "../schema/SyntaxValidator.js";
import { assertNever } from "../types.js";
import { withUnitOfWork } from "../uow/withUnitOfWork.js";
import type { RaisedMessage, UnitOfWork, UnitOfWorkFactory, UnitOfWorkScopeInfo } from "../uow/types.js";

export interface DispatchOptions {
  /** Caller-assigned id; generated when absent */
  messageId?: string;
  /** Shared with every follow-up event; generated when absent */
  correlationId?: string;
  /** Abandons the dispatch, follow-ups included, when aborted */
  signal?: AbortSignal;
}

/**
 * Everything the bus needs, assembled and frozen by the builder.
 */
export interface MessageBusDeps<TUow extends UnitOfWork> {
  schemas: SchemaRegistry;
  preconditions: PreconditionRegistry<TUow>;
  handlers: HandlerRegistry<TUow>;
  unitOfWork: UnitOfWorkFactory<TUow>;
  logger: Logger;
  config: BusConfig;
}

/**
 * Introspection view of one message type and what is wired to it.
 */
export interface MessageRoute extends SchemaInfo {
  preconditions: string[];
  handlers: string[];
}

const ENVELOPE_ROOT_FIELD = "envelope";

const EnvelopeSchema = z.object(
  {
    type: fields.string({ minLength: 1 }),
    payload: z.unknown(),
  },
  { required_error: "expected object", invalid_type_error: "expected object" }
);

interface Processed {
  outcome: Outcome;
  raised: RaisedMessage[];
}

interface ScopeReport {
  report: HandlerReport;
  raised: RaisedMessage[];
}

interface PendingFollowUp {
  message: RaisedMessage;
  depth: number;
  causationId: MessageId;
  /** The followUps list of the outcome that raised this message */
  sink: Outcome[];
}

/**
 * Per-dispatch state shared by the root message and its follow-ups.
 */
interface DispatchRun {
  correlationId: CorrelationId;
  signal: AbortSignal;
}

function verdictReport(
  handler: string,
  verdict: Exclude<PreconditionVerdict, { status: "pass" }>
): HandlerReport {
  switch (verdict.status) {
    case "skip":
      return {
        handler,
        status: "skipped",
        reason: verdict.reason,
        precondition: verdict.precondition,
      };
    case "unprocessable":
      return {
        handler,
        status: "unprocessable",
        kind: verdict.kind,
        detail: verdict.detail,
        precondition: verdict.precondition,
        ...(verdict.context !== undefined && { context: verdict.context }),
      };
    default:
      return assertNever(verdict);
  }
}

function idErrors(options: DispatchOptions): FieldError[] {
  const errors: FieldError[] = [];
  if (options.messageId !== undefined && !isValidIdString(options.messageId)) {
    errors.push({ field: "messageId", reason: "must be a non-empty string" });
  }
  if (options.correlationId !== undefined && !isValidIdString(options.correlationId)) {
    errors.push({ field: "correlationId", reason: "must be a non-empty string" });
  }
  return errors;
}

export class MessageBus<TUow extends UnitOfWork> {
  private readonly schemas: SchemaRegistry;
  private readonly preconditions: PreconditionRegistry<TUow>;
  private readonly handlers: HandlerRegistry<TUow>;
  private readonly unitOfWork: UnitOfWorkFactory<TUow>;
  private readonly logger: Logger;
  private readonly config: BusConfig;

  constructor(deps: MessageBusDeps<TUow>) {
    this.schemas = deps.schemas;
    this.preconditions = deps.preconditions;
    this.handlers = deps.handlers;
    this.unitOfWork = deps.unitOfWork;
    this.logger = deps.logger;
    this.config = deps.config;
  }

  /**
   * Validate and dispatch one message.
   *
   * Never throws for anything that happens during dispatch; every failure
   * is an Outcome.
   *
   * @example
   * ```typescript
   * const outcome = await bus.dispatch("Allocate", { orderid: "o1", sku: "LAMP", qty: 3 });
   * if (outcome.status === "dispatched") {
   *   console.log(outcome.result); // "batch-001"
   * }
   * ```
   */
  async dispatch(type: string, payload: unknown, options: DispatchOptions = {}): Promise<Outcome> {
    const definition = this.schemas.get(type);
    if (!definition) {
      logUnknownType(this.logger, { messageType: type });
      return unknownTypeOutcome(type);
    }

    const invalidIds = idErrors(options);
    if (invalidIds.length > 0) {
      logRejected(this.logger, { messageType: type }, invalidIds);
      return rejectedOutcome(type, definition.kind, invalidIds);
    }

    const cancellation = createCancellation(options.signal, this.config.dispatchTimeoutMs);
    try {
      const run: DispatchRun = {
        correlationId:
          options.correlationId !== undefined
            ? toCorrelationId(options.correlationId)
            : generateCorrelationId(),
        signal: cancellation.signal,
      };
      const messageId =
        options.messageId !== undefined ? toMessageId(options.messageId) : generateMessageId();

      const root = await this.process(definition, payload, messageId, run, {});
      await this.drainFollowUps(root, messageId, run);
      return root.outcome;
    } finally {
      cancellation.dispose();
    }
  }

  /**
   * Dispatch a transport envelope `{ type, payload }`.
   *
   * A malformed envelope is `rejected`, with `envelope` as the field when
   * it is not an object at all.
   */
  async dispatchEnvelope(envelope: unknown, options: DispatchOptions = {}): Promise<Outcome> {
    const parsed = EnvelopeSchema.safeParse(envelope);
    if (!parsed.success) {
      const fieldErrors = toFieldErrors(parsed.error.issues, ENVELOPE_ROOT_FIELD);
      this.logger.warn("Envelope rejected", { fieldErrors });
      return rejectedOutcome("", undefined, fieldErrors);
    }
    return this.dispatch(parsed.data.type, parsed.data.payload, options);
  }

  /**
   * Registered message types with their preconditions and handlers, in
   * registration order.
   */
  describe(): MessageRoute[] {
    return this.schemas.list().map((info) => ({
      ...info,
      preconditions: this.preconditions.names(info.type),
      handlers: this.handlers.get(info.type).map((registration) => registration.name),
    }));
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private async process(
    definition: MessageDefinition,
    payload: unknown,
    messageId: MessageId,
    run: DispatchRun,
    extraLogContext: Record<string, unknown>
  ): Promise<Processed> {
    const { type, kind } = definition;

    const syntax = validateSyntax(definition, payload);
    if (!syntax.valid) {
      logRejected(
        this.logger,
        { messageType: type, messageId, correlationId: run.correlationId, ...extraLogContext },
        syntax.errors
      );
      return { outcome: rejectedOutcome(type, kind, syntax.errors), raised: [] };
    }

    const identity: OutcomeIdentity = {
      messageType: type,
      messageKind: kind,
      messageId,
      correlationId: run.correlationId,
    };
    const logContext: DispatchLogContext = {
      messageType: type,
      messageId,
      correlationId: run.correlationId,
      ...extraLogContext,
    };
    logDispatchStart(this.logger, { ...logContext, messageKind: kind });

    if (run.signal.aborted) {
      const outcome = failedOutcome(identity, DispatchErrors.aborted(run.signal.reason));
      this.logOutcome(outcome, logContext);
      return { outcome, raised: [] };
    }

    const message: unknown = syntax.message;
    const preconditions = this.preconditions.get(type);
    const registrations = this.handlers.get(type);
    const raised: RaisedMessage[] = [];
    let outcome: Outcome;

    if (kind === "command") {
      const [registration] = registrations;
      if (registration === undefined) {
        outcome = failedOutcome(
          identity,
          new DispatchError(
            ErrorCategory.CONFIGURATION,
            "COMMAND_HANDLER_MISSING",
            `No handler registered for command "${type}"`,
            false,
            { messageType: type }
          )
        );
      } else {
        const scope = await this.runScope(identity, message, preconditions, registration, run.signal);
        raised.push(...scope.raised);
        outcome = commandOutcome(identity, scope.report);
      }
    } else {
      const reports: HandlerReport[] = [];
      for (const registration of registrations) {
        const scope = await this.runScope(identity, message, preconditions, registration, run.signal, {
          perHandler: true,
        });
        reports.push(scope.report);
        raised.push(...scope.raised);
      }
      outcome = eventOutcome(identity, reports);
    }

    this.logOutcome(outcome, logContext);
    return { outcome, raised };
  }

  /**
   * One unit of work: preconditions, then the handler, then commit.
   */
  private async runScope(
    identity: OutcomeIdentity,
    message: unknown,
    preconditions: ReadonlyArray<Precondition<unknown, TUow>>,
    registration: HandlerRegistration<TUow>,
    signal: AbortSignal,
    options: { perHandler?: boolean } = {}
  ): Promise<ScopeReport> {
    const handler = registration.name;
    const { messageType, messageId, correlationId } = identity;
    const info: UnitOfWorkScopeInfo = {
      messageType,
      messageId,
      correlationId,
      ...(options.perHandler === true && { handler }),
    };
    const context: HandlerContext = {
      messageType,
      messageId,
      correlationId,
      signal,
      logger: this.logger,
    };

    try {
      throwIfAborted(signal);
      const scope = await withUnitOfWork<TUow, HandlerReport>(
        this.unitOfWork,
        info,
        async (uow) => {
          const verdict = await runPreconditions(preconditions, message, uow, { signal });
          if (verdict.status !== "pass") {
            return { commit: false, value: verdictReport(handler, verdict) };
          }

          this.logger.debug("Invoking handler", { messageType, messageId, handler });
          const startedAt = Date.now();
          const result = await raceAbort(registration.handler.handle(message, uow, context), signal);
          throwIfAborted(signal);
          this.logger.trace("Handler returned", {
            messageType,
            messageId,
            handler,
            durationMs: Date.now() - startedAt,
          });
          return { commit: true, value: { handler, status: "completed", result } };
        },
        this.logger
      );
      return { report: scope.value, raised: scope.raised };
    } catch (error) {
      if (UnprocessableError.isUnprocessable(error)) {
        return {
          report: {
            handler,
            status: "unprocessable",
            kind: error.kind,
            detail: error.detail,
            ...(error.context !== undefined && { context: error.context }),
          },
          raised: [],
        };
      }
      return {
        report: { handler, status: "failed", error: DispatchErrors.internal(error) },
        raised: [],
      };
    }
  }

  /**
   * Dispatch raised events breadth-first, generation by generation.
   */
  private async drainFollowUps(root: Processed, rootId: MessageId, run: DispatchRun): Promise<void> {
    const queue: PendingFollowUp[] = this.pendingFrom(root, rootId, 1);

    // The iterator picks up entries appended while draining.
    for (const pending of queue) {
      const { message, depth, causationId, sink } = pending;
      const messageId = generateMessageId();
      const extraLogContext = { causationId, depth };
      const definition = this.schemas.get(message.type);

      if (!definition) {
        logUnknownType(this.logger, {
          messageType: message.type,
          messageId,
          correlationId: run.correlationId,
          ...extraLogContext,
        });
        sink.push(unknownTypeOutcome(message.type));
        continue;
      }

      if (depth > this.config.maxFollowUpDepth) {
        const outcome = failedOutcome(
          {
            messageType: message.type,
            messageKind: definition.kind,
            messageId,
            correlationId: run.correlationId,
          },
          DispatchErrors.followUpDepthExceeded(message.type, this.config.maxFollowUpDepth)
        );
        logFailed(
          this.logger,
          { messageType: message.type, messageId, correlationId: run.correlationId, ...extraLogContext },
          outcome.error
        );
        sink.push(outcome);
        continue;
      }

      const processed = await this.process(definition, message.payload, messageId, run, extraLogContext);
      sink.push(processed.outcome);
      queue.push(...this.pendingFrom(processed, messageId, depth + 1));
    }
  }

  private pendingFrom(processed: Processed, causationId: MessageId, depth: number): PendingFollowUp[] {
    const { outcome, raised } = processed;
    if (raised.length === 0 || (outcome.status !== "dispatched" && outcome.status !== "failed")) {
      return [];
    }
    const sink = outcome.followUps;
    return raised.map((message) => ({ message, depth, causationId, sink }));
  }

  private logOutcome(outcome: Outcome, context: DispatchLogContext): void {
    switch (outcome.status) {
      case "dispatched":
        logDispatched(this.logger, context, outcome.handlers);
        return;
      case "skipped":
        logSkipped(this.logger, context, outcome);
        return;
      case "unprocessable":
        logUnprocessable(this.logger, context, outcome);
        return;
      case "failed":
        logFailed(this.logger, context, outcome.error, outcome.handlers);
        return;
      case "rejected":
        logRejected(this.logger, context, outcome.fieldErrors);
        return;
      case "unknown_type":
        logUnknownType(this.logger, context);
        return;
      default:
        assertNever(outcome);
    }
  }
}

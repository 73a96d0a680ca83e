/**
 * Consumer boundary: Outcome → acknowledge, drop or retry.
 *
 * Rejected, unknown and unprocessable messages are dropped. Failures are
 * retried only when their error is retryable. Every disposition is logged.
 */
import { describeError } from "../logging/dispatch.js";
import type { Logger } from "../logging/types.js";
import type { Outcome } from "../outcomes/types.js";
import { assertNever } from "../types.js";

export type ConsumerAction = "ack" | "drop" | "retry";

export interface ConsumerDisposition {
  action: ConsumerAction;
  reason: string;
}

/**
 * @example
 * ```typescript
 * consumer.on("message", async (raw) => {
 *   const outcome = await bus.dispatchEnvelope(JSON.parse(raw.body));
 *   const { action } = toConsumerDisposition(outcome, logger);
 *   if (action === "retry") raw.nack();
 *   else raw.ack();
 * });
 * ```
 */
export function toConsumerDisposition(outcome: Outcome, logger: Logger): ConsumerDisposition {
  const data = { messageType: outcome.messageType, status: outcome.status };

  switch (outcome.status) {
    case "dispatched":
      logger.info("Consumer ack", data);
      return { action: "ack", reason: "dispatched" };

    case "skipped": {
      const reason = `skipped: ${outcome.reason}`;
      logger.info("Consumer ack", { ...data, reason });
      return { action: "ack", reason };
    }

    case "rejected": {
      const reason = `rejected: ${outcome.fieldErrors
        .map((error) => `${error.field} ${error.reason}`)
        .join("; ")}`;
      logger.error("Consumer drop", { ...data, reason });
      return { action: "drop", reason };
    }

    case "unknown_type": {
      const reason = `unknown message type: ${outcome.messageType}`;
      logger.error("Consumer drop", { ...data, reason });
      return { action: "drop", reason };
    }

    case "unprocessable": {
      const reason = `${outcome.kind}: ${outcome.detail}`;
      logger.error("Consumer drop", { ...data, reason });
      return { action: "drop", reason };
    }

    case "failed": {
      const { error } = outcome;
      const reason = `${error.code}: ${error.message}`;
      const logData = { ...data, reason, messageId: outcome.messageId, error: describeError(error) };
      if (error.retryable) {
        logger.warn("Consumer retry", logData);
        return { action: "retry", reason };
      }
      logger.error("Consumer drop", logData);
      return { action: "drop", reason };
    }

    default:
      return assertNever(outcome);
  }
}

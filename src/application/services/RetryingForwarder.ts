import type { RetryPolicy } from "../../domain/entities/WebhookRule";
import { ForwardNetworkError } from "../../domain/errors/RelayErrors";
import { retryDelayMs } from "../../domain/services/RetryPolicyResolver";
import { logger } from "../../infrastructure/logger";
import type { ForwardRequest, ForwardResponse, ForwardingPort } from "../../ports/ForwardingPort";

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Bounded retry around a ForwardingPort.
 *
 * Only transport failures are retried. A received response of any status, and
 * an unsupported method, end the loop immediately.
 */
export class RetryingForwarder {
  constructor(
    private readonly client: ForwardingPort,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async send(request: ForwardRequest, policy: RetryPolicy): Promise<ForwardResponse> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.client.send(request);
      } catch (error) {
        if (!(error instanceof ForwardNetworkError) || attempt >= policy.attempts) {
          throw error;
        }

        const delay = retryDelayMs(policy, attempt);
        logger.warn({
          type: "FORWARD_RETRY",
          message: "Transport failure reaching target, retrying",
          payload: { url: request.url, attempt, maxAttempts: policy.attempts, delayMs: delay },
          error: error.message,
        });
        await this.sleep(delay);
      }
    }
  }
}

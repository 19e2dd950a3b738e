import type { RetryPolicy } from "../entities/WebhookRule";

// Global settings carry no multiplier of their own
export const DEFAULT_BACKOFF_MULTIPLIER = 2;

export interface RetryDefaults {
  attempts: number;
  delayMs: number;
}

export const resolveRetryPolicy = (
  rulePolicy: RetryPolicy | undefined,
  defaults: RetryDefaults,
): RetryPolicy => {
  const policy = rulePolicy ?? {
    attempts: defaults.attempts,
    delayMs: defaults.delayMs,
    backoffMultiplier: DEFAULT_BACKOFF_MULTIPLIER,
  };
  // attempts counts total tries, so zero still sends once
  return { ...policy, attempts: Math.max(1, policy.attempts) };
};

// Largest delay setTimeout honours; longer ones fire after 1 ms
export const MAX_RETRY_DELAY_MS = 2 ** 31 - 1;

/** Delay to wait after the `failedAttempt`-th try (1-based) before the next one. */
export const retryDelayMs = (policy: RetryPolicy, failedAttempt: number): number =>
  Math.min(
    MAX_RETRY_DELAY_MS,
    Math.round(policy.delayMs * policy.backoffMultiplier ** (failedAttempt - 1)),
  );

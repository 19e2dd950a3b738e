import type { RegisterConfig, RelayConfig } from "../../config/relayConfig";
import type { TemplateRendererPort } from "../../ports/TemplateRendererPort";
import type { RetryPolicy, WebhookRule } from "../entities/WebhookRule";

const toRetryPolicy = (register: RegisterConfig): RetryPolicy | undefined =>
  register.retry_config
    ? {
        attempts: register.retry_config.attempts,
        delayMs: register.retry_config.delay_ms,
        backoffMultiplier: register.retry_config.backoff_multiplier,
      }
    : undefined;

/**
 * Immutable path -> rule mapping, built once at startup and shared by every request.
 */
export class EndpointRegistry {
  private constructor(private readonly rules: ReadonlyMap<string, WebhookRule>) {}

  /**
   * Compiles every template through `renderer`. A compile failure propagates
   * (startup-fatal). Registers sharing an endpoint: the later one wins.
   */
  static fromConfig(config: RelayConfig, renderer: TemplateRendererPort): EndpointRegistry {
    const rules = new Map<string, WebhookRule>();

    for (const register of config.registers) {
      const rule: WebhookRule = Object.freeze({
        endpoint: register.endpoint,
        inboundMethod: register.method,
        target: Object.freeze({
          url: register.target.url,
          method: register.target.method,
          headers: Object.freeze({ ...register.target.headers }),
          timeoutSeconds: register.target.timeout_seconds ?? undefined,
        }),
        template: renderer.compile(register.template),
        retryPolicy: toRetryPolicy(register),
      });
      rules.set(register.endpoint, rule);
    }

    return new EndpointRegistry(rules);
  }

  /** Exact, verbatim match; no wildcard or trailing-slash normalization. */
  lookup(path: string): WebhookRule | undefined {
    return this.rules.get(path);
  }

  endpoints(): string[] {
    return [...this.rules.keys()];
  }

  get size(): number {
    return this.rules.size;
  }
}

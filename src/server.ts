import type express from "express";
import { DispatchWebhook } from "./application/useCases/DispatchWebhook";
import { RetryingForwarder, Sleep } from "./application/services/RetryingForwarder";
import type { RelayConfig } from "./config/relayConfig";
import { SERVICE_NAME, SERVICE_VERSION } from "./config/service";
import { EndpointRegistry } from "./domain/services/EndpointRegistry";
import { RelayConfigValidator } from "./domain/validators/RelayConfigValidator";
import { AxiosForwardingClient } from "./infrastructure/adapters/forwarding/AxiosForwardingClient";
import { createApp } from "./infrastructure/http/app";
import { RelayMetrics } from "./infrastructure/metrics/RelayMetrics";
import { HandlebarsTemplateRenderer } from "./infrastructure/templating/HandlebarsTemplateRenderer";
import type { ForwardingPort } from "./ports/ForwardingPort";

export interface RelayOptions {
  requestTimeoutSeconds: number;
  healthCheckEnabled: boolean;
  // Overridable for tests
  forwardingClient?: ForwardingPort;
  sleep?: Sleep;
  collectDefaultMetrics?: boolean;
}

export interface Relay {
  app: express.Express;
  registry: EndpointRegistry;
  metrics?: RelayMetrics;
}

/**
 * Validates the configuration, compiles the registry and assembles the app.
 * Throws RelayConfigError (startup-fatal) before anything is served.
 */
export const buildRelay = (config: RelayConfig, options: RelayOptions): Relay => {
  RelayConfigValidator.validate(config, new HandlebarsTemplateRenderer());

  const renderer = new HandlebarsTemplateRenderer();
  const registry = EndpointRegistry.fromConfig(config, renderer);

  const defaultTimeoutMs = options.requestTimeoutSeconds * 1000;
  const client = options.forwardingClient ?? new AxiosForwardingClient({ timeoutMs: defaultTimeoutMs });
  const forwarder = new RetryingForwarder(client, options.sleep);

  const dispatchWebhook = new DispatchWebhook(registry, renderer, forwarder, {
    defaultTimeoutMs,
    retryDefaults: {
      attempts: config.settings.retry_attempts,
      delayMs: config.settings.retry_delay_ms,
    },
  });

  const metrics = config.settings.enable_metrics
    ? new RelayMetrics({ collectDefaults: options.collectDefaultMetrics })
    : undefined;

  const app = createApp({
    dispatchWebhook,
    healthCheckEnabled: options.healthCheckEnabled,
    service: { name: SERVICE_NAME, version: SERVICE_VERSION },
    metrics,
  });

  return { app, registry, metrics };
};

/**
 * Use case: DispatchWebhook
 *
 * Per-request pipeline: lookup -> parse -> render -> validate -> forward -> respond.
 * Every step either advances or throws a RelayError; nothing is retried here and
 * no state survives between requests.
 */

import { JsonValue, parseJson } from "../../domain/entities/JsonValue";
import {
  EndpointNotFoundError,
  InvalidInboundJsonError,
  RenderedPayloadNotJsonError,
  describeError,
} from "../../domain/errors/RelayErrors";
import type { EndpointRegistry } from "../../domain/services/EndpointRegistry";
import { RetryDefaults, resolveRetryPolicy } from "../../domain/services/RetryPolicyResolver";
import { toTemplateData } from "../../domain/services/TemplateData";
import { logger } from "../../infrastructure/logger";
import type { TemplateRendererPort } from "../../ports/TemplateRendererPort";
import type { RetryingForwarder } from "../services/RetryingForwarder";

export interface DispatchWebhookInput {
  path: string;
  rawBody: string;
}

export interface DispatchWebhookOutput {
  status: "success";
  target_response: JsonValue;
}

export interface DispatchWebhookOptions {
  defaultTimeoutMs: number;
  retryDefaults: RetryDefaults;
}

export class DispatchWebhook {
  constructor(
    private readonly registry: EndpointRegistry,
    private readonly renderer: TemplateRendererPort,
    private readonly forwarder: RetryingForwarder,
    private readonly options: DispatchWebhookOptions,
  ) {}

  async execute(input: DispatchWebhookInput): Promise<DispatchWebhookOutput> {
    const rule = this.registry.lookup(input.path);
    if (!rule) {
      throw new EndpointNotFoundError(input.path);
    }

    let inbound: JsonValue;
    try {
      inbound = parseJson(input.rawBody);
    } catch (error) {
      throw new InvalidInboundJsonError(describeError(error));
    }

    const rendered = this.renderer.render(rule.template, toTemplateData(inbound));

    let payload: JsonValue;
    try {
      payload = parseJson(rendered);
    } catch (error) {
      throw new RenderedPayloadNotJsonError(describeError(error));
    }

    const timeoutMs =
      rule.target.timeoutSeconds !== undefined
        ? rule.target.timeoutSeconds * 1000
        : this.options.defaultTimeoutMs;

    const response = await this.forwarder.send(
      {
        method: rule.target.method,
        url: rule.target.url,
        body: payload,
        headers: rule.target.headers,
        timeoutMs,
      },
      resolveRetryPolicy(rule.retryPolicy, this.options.retryDefaults),
    );

    logger.info({
      type: "WEBHOOK_FORWARDED",
      message: "Payload forwarded to target",
      payload: {
        endpoint: rule.endpoint,
        target: rule.target.url,
        method: rule.target.method.toUpperCase(),
        upstreamStatus: response.status,
      },
    });

    return { status: "success", target_response: response.body };
  }
}

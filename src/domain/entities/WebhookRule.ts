import type { TemplateHandle } from "../../ports/TemplateRendererPort";

export const SUPPORTED_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH"] as const;

export type HttpMethod = (typeof SUPPORTED_METHODS)[number];

/** Case-insensitive match against the supported verbs. */
export const toHttpMethod = (method: string): HttpMethod | undefined =>
  SUPPORTED_METHODS.find((supported) => supported === method.toUpperCase());

export const isSupportedMethod = (method: string): boolean => toHttpMethod(method) !== undefined;

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  backoffMultiplier: number;
}

export interface Target {
  url: string;
  // Kept as configured; validated against SUPPORTED_METHODS per request
  method: string;
  headers: Record<string, string>;
  timeoutSeconds?: number;
}

export interface WebhookRule {
  endpoint: string;
  inboundMethod: string;
  target: Target;
  template: TemplateHandle;
  retryPolicy?: RetryPolicy;
}

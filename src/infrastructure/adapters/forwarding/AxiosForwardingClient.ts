import axios, { AxiosInstance, AxiosResponse } from "axios";
import { JsonValue, parseJson, stringifyJson } from "../../../domain/entities/JsonValue";
import { toHttpMethod } from "../../../domain/entities/WebhookRule";
import {
  ForwardNetworkError,
  UnsupportedMethodError,
  describeError,
} from "../../../domain/errors/RelayErrors";
import type { ForwardRequest, ForwardResponse, ForwardingPort } from "../../../ports/ForwardingPort";

const toRelayBody = (text: string): JsonValue => {
  try {
    return parseJson(text);
  } catch {
    // Non-JSON upstream bodies are relayed as a JSON string
    return text;
  }
};

const withJsonContentType = (headers: Record<string, string>): Record<string, string> => {
  const merged: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== "content-type") {
      merged[name] = value;
    }
  }
  merged["Content-Type"] = "application/json";
  return merged;
};

/**
 * Outbound HTTP for the relay. One shared axios instance (and connection pool);
 * timeout and headers come with each request.
 */
export class AxiosForwardingClient implements ForwardingPort {
  private readonly http: AxiosInstance;

  constructor(options: { timeoutMs: number }) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      responseType: "text",
      // Keep the raw text; parsing happens in toRelayBody
      transformResponse: [(data: string) => data],
      // Any status the target answers with is relayed, never thrown
      validateStatus: () => true,
    });
  }

  async send(request: ForwardRequest): Promise<ForwardResponse> {
    const method = toHttpMethod(request.method);
    if (!method) {
      throw new UnsupportedMethodError(request.method.toUpperCase());
    }

    let response: AxiosResponse<string>;
    try {
      response = await this.http.request<string>({
        method,
        url: request.url,
        headers: withJsonContentType(request.headers),
        data: stringifyJson(request.body),
        timeout: request.timeoutMs,
      });
    } catch (error) {
      throw new ForwardNetworkError(describeError(error));
    }

    return { status: response.status, body: toRelayBody(response.data) };
  }
}

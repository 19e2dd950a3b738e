import type { JsonValue } from "../domain/entities/JsonValue";

export interface ForwardRequest {
  method: string;
  url: string;
  body: JsonValue;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface ForwardResponse {
  status: number;
  // Parsed upstream body, or the raw text as a JSON string when it is not JSON
  body: JsonValue;
}

export interface ForwardingPort {
  send(request: ForwardRequest): Promise<ForwardResponse>;
}

/**
 * Error taxonomy of the relay. Per-request errors carry the HTTP status the
 * dispatch layer answers with; startup errors are thrown before the server listens.
 */
export class RelayError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(params: { statusCode: number; code: string; message: string }) {
    super(params.message);
    this.name = "RelayError";
    this.statusCode = params.statusCode;
    this.code = params.code;
  }
}

export class EndpointNotFoundError extends RelayError {
  constructor(readonly path: string) {
    super({ statusCode: 404, code: "ENDPOINT_NOT_FOUND", message: "Endpoint not found" });
    this.name = "EndpointNotFoundError";
  }
}

export class InvalidInboundJsonError extends RelayError {
  constructor(cause: string) {
    super({ statusCode: 400, code: "INVALID_INBOUND_JSON", message: `Invalid JSON: ${cause}` });
    this.name = "InvalidInboundJsonError";
  }
}

export class TemplateRenderError extends RelayError {
  constructor(cause: string) {
    super({
      statusCode: 500,
      code: "TEMPLATE_RENDER_FAILED",
      message: `Template rendering failed: ${cause}`,
    });
    this.name = "TemplateRenderError";
  }
}

export class RenderedPayloadNotJsonError extends RelayError {
  constructor(cause: string) {
    super({
      statusCode: 500,
      code: "RENDERED_PAYLOAD_NOT_JSON",
      message: `Rendered template is not valid JSON: ${cause}`,
    });
    this.name = "RenderedPayloadNotJsonError";
  }
}

export class UnsupportedMethodError extends RelayError {
  constructor(readonly method: string) {
    super({
      statusCode: 500,
      code: "UNSUPPORTED_TARGET_METHOD",
      message: `Unsupported HTTP method: ${method}`,
    });
    this.name = "UnsupportedMethodError";
  }
}

export class ForwardNetworkError extends RelayError {
  constructor(cause: string) {
    super({
      statusCode: 500,
      code: "UPSTREAM_TRANSPORT_FAILURE",
      message: `Failed to send request to target: ${cause}`,
    });
    this.name = "ForwardNetworkError";
  }
}

// Startup-fatal: never reaches a caller
export class TemplateCompileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateCompileError";
  }
}

export class RelayConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RelayConfigError";
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

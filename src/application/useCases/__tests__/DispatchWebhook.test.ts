import { RelayConfigSchema } from "../../../config/relayConfig";
import {
  EndpointNotFoundError,
  ForwardNetworkError,
  InvalidInboundJsonError,
  RenderedPayloadNotJsonError,
  TemplateRenderError,
} from "../../../domain/errors/RelayErrors";
import { EndpointRegistry } from "../../../domain/services/EndpointRegistry";
import { HandlebarsTemplateRenderer } from "../../../infrastructure/templating/HandlebarsTemplateRenderer";
import { RetryingForwarder } from "../../services/RetryingForwarder";
import { DispatchWebhook } from "../DispatchWebhook";

const config = RelayConfigSchema.parse({
  registers: [
    {
      endpoint: "/hook",
      method: "POST",
      target: { url: "http://upstream.test/hook", method: "post", headers: { "X-Token": "test-secret" } },
      template: '{"text": "{{a}}"}',
    },
    {
      endpoint: "/wrap",
      method: "POST",
      target: { url: "http://upstream.test/wrap", method: "PUT", timeout_seconds: 5 },
      template: '{"value": {{data}}}',
    },
    {
      endpoint: "/raw",
      method: "POST",
      target: { url: "http://upstream.test/raw", method: "POST" },
      template: "{{a}}",
    },
    {
      endpoint: "/helper",
      method: "POST",
      target: { url: "http://upstream.test/helper", method: "POST" },
      template: "{{shout a}}",
    },
    {
      endpoint: "/snowflake",
      method: "POST",
      target: { url: "http://upstream.test/snowflake", method: "POST" },
      template: '{"id": {{id}} }',
    },
    {
      endpoint: "/retrying",
      method: "POST",
      target: { url: "http://upstream.test/retrying", method: "POST" },
      template: "{}",
      retry_config: { attempts: 4, delay_ms: 50, backoff_multiplier: 3 },
    },
  ],
  settings: { retry_attempts: 2, retry_delay_ms: 10 },
});

describe("DispatchWebhook", () => {
  let send: jest.Mock;
  let sleep: jest.Mock;
  let renderer: HandlebarsTemplateRenderer;
  let useCase: DispatchWebhook;

  beforeEach(() => {
    send = jest.fn().mockResolvedValue({ status: 200, body: { received: true } });
    sleep = jest.fn().mockResolvedValue(undefined);
    renderer = new HandlebarsTemplateRenderer();
    const registry = EndpointRegistry.fromConfig(config, renderer);
    useCase = new DispatchWebhook(registry, renderer, new RetryingForwarder({ send }, sleep), {
      defaultTimeoutMs: 30_000,
      retryDefaults: { attempts: config.settings.retry_attempts, delayMs: config.settings.retry_delay_ms },
    });
  });

  it("renders the payload and forwards it to the target", async () => {
    const result = await useCase.execute({ path: "/hook", rawBody: '{"a": 1}' });

    expect(result).toEqual({ status: "success", target_response: { received: true } });
    expect(send).toHaveBeenCalledWith({
      method: "post",
      url: "http://upstream.test/hook",
      body: { text: "1" },
      headers: { "X-Token": "test-secret" },
      timeoutMs: 30_000,
    });
  });

  it("wraps non-object payloads and applies the target timeout", async () => {
    await useCase.execute({ path: "/wrap", rawBody: "42" });

    expect(send).toHaveBeenCalledWith(
      expect.objectContaining({ method: "PUT", body: { value: 42 }, timeoutMs: 5000 }),
    );
  });

  it("forwards a bare value rendered from a single expression", async () => {
    const result = await useCase.execute({ path: "/raw", rawBody: '{"a": 1}' });

    expect(result.status).toBe("success");
    expect(send).toHaveBeenCalledWith(expect.objectContaining({ url: "http://upstream.test/raw", body: 1 }));
  });

  it("keeps 64-bit integers exact in both directions", async () => {
    send.mockResolvedValueOnce({ status: 200, body: { message_id: 1234567890123456789n } });

    const result = await useCase.execute({ path: "/snowflake", rawBody: '{"id": 1234567890123456789}' });

    expect(send).toHaveBeenCalledWith(expect.objectContaining({ body: { id: 1234567890123456789n } }));
    expect(result).toEqual({ status: "success", target_response: { message_id: 1234567890123456789n } });
  });

  it("relays the upstream body whatever its status", async () => {
    send.mockResolvedValueOnce({ status: 503, body: "maintenance" });

    await expect(useCase.execute({ path: "/hook", rawBody: "{}" })).resolves.toEqual({
      status: "success",
      target_response: "maintenance",
    });
  });

  it("rejects unknown endpoints", async () => {
    await expect(useCase.execute({ path: "/unknown", rawBody: "{}" })).rejects.toBeInstanceOf(
      EndpointNotFoundError,
    );
    expect(send).not.toHaveBeenCalled();
  });

  it("rejects malformed JSON before rendering", async () => {
    const render = jest.spyOn(renderer, "render");

    await expect(useCase.execute({ path: "/hook", rawBody: "not json" })).rejects.toBeInstanceOf(
      InvalidInboundJsonError,
    );
    await expect(useCase.execute({ path: "/hook", rawBody: "" })).rejects.toThrow(/^Invalid JSON: /);
    expect(render).not.toHaveBeenCalled();
    expect(send).not.toHaveBeenCalled();
  });

  it("rejects rendered output that is not JSON", async () => {
    const attempt = useCase.execute({ path: "/raw", rawBody: '{"a": "plain text"}' });

    await expect(attempt).rejects.toBeInstanceOf(RenderedPayloadNotJsonError);
    await expect(attempt).rejects.toThrow(/^Rendered template is not valid JSON: /);
    expect(send).not.toHaveBeenCalled();
  });

  it("surfaces render failures", async () => {
    await expect(useCase.execute({ path: "/helper", rawBody: '{"a": 1}' })).rejects.toThrow(
      new TemplateRenderError('Missing helper: "shout"'),
    );
  });

  it("produces identical outbound requests for identical inbound requests", async () => {
    await useCase.execute({ path: "/hook", rawBody: '{"a": "same"}' });
    await useCase.execute({ path: "/hook", rawBody: '{"a": "same"}' });

    expect(send).toHaveBeenCalledTimes(2);
    expect(send.mock.calls[1][0]).toEqual(send.mock.calls[0][0]);
  });

  it("retries with the global settings when the rule has no policy", async () => {
    send.mockRejectedValue(new ForwardNetworkError("connect ECONNREFUSED"));

    await expect(useCase.execute({ path: "/hook", rawBody: "{}" })).rejects.toBeInstanceOf(
      ForwardNetworkError,
    );
    expect(send).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[10]]);
  });

  it("retries with the rule's own policy when present", async () => {
    send.mockRejectedValue(new ForwardNetworkError("connect ECONNREFUSED"));

    await expect(useCase.execute({ path: "/retrying", rawBody: "{}" })).rejects.toBeInstanceOf(
      ForwardNetworkError,
    );
    expect(send).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[50], [150], [450]]);
  });
});

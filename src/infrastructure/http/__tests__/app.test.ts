import request from "supertest";
import { RetryingForwarder } from "../../../application/services/RetryingForwarder";
import { DispatchWebhook } from "../../../application/useCases/DispatchWebhook";
import { RelayConfigSchema } from "../../../config/relayConfig";
import { ForwardNetworkError, UnsupportedMethodError } from "../../../domain/errors/RelayErrors";
import { EndpointRegistry } from "../../../domain/services/EndpointRegistry";
import { RelayMetrics } from "../../metrics/RelayMetrics";
import { HandlebarsTemplateRenderer } from "../../templating/HandlebarsTemplateRenderer";
import { createApp } from "../app";

const config = RelayConfigSchema.parse({
  registers: [
    {
      endpoint: "/hook",
      method: "POST",
      target: { url: "http://upstream.test/hook", method: "POST" },
      template: '{"text": "{{a}}"}',
    },
    {
      endpoint: "/wrap",
      method: "POST",
      target: { url: "http://upstream.test/wrap", method: "POST" },
      template: '{"value": {{data}}}',
    },
    {
      endpoint: "/raw",
      method: "POST",
      target: { url: "http://upstream.test/raw", method: "POST" },
      template: "{{a}}",
    },
  ],
  settings: { retry_attempts: 1 },
});

describe("relay HTTP app", () => {
  let send: jest.Mock;

  const buildApp = (options: { healthCheckEnabled?: boolean; metrics?: RelayMetrics; bodyLimit?: string } = {}) => {
    const renderer = new HandlebarsTemplateRenderer();
    const dispatchWebhook = new DispatchWebhook(
      EndpointRegistry.fromConfig(config, renderer),
      renderer,
      new RetryingForwarder({ send }, jest.fn().mockResolvedValue(undefined)),
      { defaultTimeoutMs: 30_000, retryDefaults: { attempts: 1, delayMs: 0 } },
    );
    return createApp({
      dispatchWebhook,
      healthCheckEnabled: options.healthCheckEnabled ?? true,
      service: { name: "hermes-relay", version: "9.9.9" },
      metrics: options.metrics,
      bodyLimit: options.bodyLimit,
    });
  };

  beforeEach(() => {
    send = jest.fn().mockResolvedValue({ status: 200, body: { received: true } });
  });

  describe("dispatch", () => {
    it("forwards a rendered payload and returns the success envelope", async () => {
      const res = await request(buildApp())
        .post("/hook")
        .set("Content-Type", "application/json")
        .send('{"a": 1}');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "success", target_response: { received: true } });
      expect(send).toHaveBeenCalledWith(expect.objectContaining({ body: { text: "1" } }));
    });

    it("forwards a bare number rendered from a single expression", async () => {
      const res = await request(buildApp()).post("/raw").set("Content-Type", "application/json").send('{"a": 1}');

      expect(res.status).toBe(200);
      expect(send).toHaveBeenCalledWith(expect.objectContaining({ body: 1 }));
    });

    it("answers with 64-bit integers written exactly", async () => {
      send.mockResolvedValueOnce({ status: 200, body: { message_id: 1234567890123456789n } });

      const res = await request(buildApp()).post("/hook").set("Content-Type", "application/json").send("{}");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
      expect(res.text).toBe('{"status":"success","target_response":{"message_id":1234567890123456789}}');
    });

    it("dispatches whatever the inbound method", async () => {
      const res = await request(buildApp())
        .put("/hook")
        .set("Content-Type", "application/json")
        .send('{"a": "x"}');

      expect(res.status).toBe(200);
      expect(send).toHaveBeenCalledTimes(1);
    });

    it("accepts JSON sent with any content type", async () => {
      const res = await request(buildApp()).post("/wrap").set("Content-Type", "text/plain").send("42");

      expect(res.status).toBe(200);
      expect(send).toHaveBeenCalledWith(expect.objectContaining({ body: { value: 42 } }));
    });

    it("answers 404 for unregistered paths", async () => {
      const res = await request(buildApp()).post("/missing").send("{}");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Endpoint not found" });
      expect(send).not.toHaveBeenCalled();
    });

    it("does not normalize trailing slashes", async () => {
      const res = await request(buildApp()).post("/hook/").set("Content-Type", "application/json").send("{}");

      expect(res.status).toBe(404);
    });

    it("answers 400 for malformed JSON", async () => {
      const res = await request(buildApp()).post("/hook").set("Content-Type", "application/json").send("not json");

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^Invalid JSON: /);
      expect(send).not.toHaveBeenCalled();
    });

    it("answers 400 for an empty body", async () => {
      const res = await request(buildApp()).post("/hook");

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^Invalid JSON: /);
    });

    it("answers 500 when the rendered output is not JSON", async () => {
      const res = await request(buildApp())
        .post("/raw")
        .set("Content-Type", "application/json")
        .send('{"a": "plain"}');

      expect(res.status).toBe(500);
      expect(res.body.error).toMatch(/^Rendered template is not valid JSON: /);
    });

    it("answers 500 with the upstream transport error", async () => {
      send.mockRejectedValue(new ForwardNetworkError("connect ECONNREFUSED"));

      const res = await request(buildApp()).post("/hook").set("Content-Type", "application/json").send("{}");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: "Failed to send request to target: connect ECONNREFUSED" });
    });

    it("answers 500 for an unsupported target method", async () => {
      send.mockRejectedValue(new UnsupportedMethodError("TRACE"));

      const res = await request(buildApp()).post("/hook").set("Content-Type", "application/json").send("{}");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: "Unsupported HTTP method: TRACE" });
    });

    it("hides unexpected failures", async () => {
      send.mockRejectedValue(new Error("socket state corrupted"));

      const res = await request(buildApp()).post("/hook").set("Content-Type", "application/json").send("{}");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: "Internal server error" });
    });

    it("rejects bodies over the configured limit", async () => {
      const res = await request(buildApp({ bodyLimit: "10b" }))
        .post("/hook")
        .set("Content-Type", "application/json")
        .send(JSON.stringify({ a: "x".repeat(50) }));

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: "request entity too large" });
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("debug", () => {
    it("accepts any body", async () => {
      const res = await request(buildApp()).post("/debug").set("Content-Type", "text/plain").send("<not json>");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "success", message: "Payload logged" });
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("health", () => {
    it("reports service identity", async () => {
      const res = await request(buildApp()).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: "healthy",
        timestamp: expect.any(Number),
        service: "hermes-relay",
        version: "9.9.9",
      });
    });

    it("reports readiness", async () => {
      const res = await request(buildApp()).get("/ready");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ready", checks: { config: "ok" } });
    });

    it("falls through to dispatch when disabled", async () => {
      const res = await request(buildApp({ healthCheckEnabled: false })).get("/health");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Endpoint not found" });
    });
  });

  describe("metrics", () => {
    it("exposes request counters when enabled", async () => {
      const app = buildApp({ metrics: new RelayMetrics() });

      await request(app).post("/hook").set("Content-Type", "application/json").send("{}");
      await request(app).post("/nowhere").send("{}");
      const res = await request(app).get("/metrics");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toMatch(/^text\/plain/);
      expect(res.text).toContain('hermes_relay_requests_total{endpoint="/hook",status="200"} 1');
      expect(res.text).toContain('hermes_relay_requests_total{endpoint="unmatched",status="404"} 1');
      expect(res.text).toContain('hermes_relay_request_duration_seconds_count{endpoint="/hook"} 1');
    });

    it("is not served when disabled", async () => {
      const res = await request(buildApp()).get("/metrics");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Endpoint not found" });
    });
  });
});

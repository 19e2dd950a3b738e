import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

/**
 * Prometheus metrics for the dispatch path, on a registry owned by the instance.
 */
export class RelayMetrics {
  readonly registry = new Registry();

  private readonly requests = new Counter({
    name: "hermes_relay_requests_total",
    help: "Dispatched webhook requests by endpoint and response status",
    labelNames: ["endpoint", "status"] as const,
    registers: [this.registry],
  });

  private readonly duration = new Histogram({
    name: "hermes_relay_request_duration_seconds",
    help: "Time from inbound request to relayed response",
    labelNames: ["endpoint"] as const,
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
    registers: [this.registry],
  });

  constructor(options: { collectDefaults?: boolean } = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  /** Returns a callback that records the outcome once the response status is known. */
  startRequest(): (endpoint: string, status: number) => void {
    const stopTimer = this.duration.startTimer();
    return (endpoint, status) => {
      stopTimer({ endpoint });
      this.requests.inc({ endpoint, status: String(status) });
    };
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}

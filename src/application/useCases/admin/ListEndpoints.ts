import type { RelayConfig } from "../../../config/relayConfig";

export interface EndpointRow {
  method: string;
  endpoint: string;
  targetMethod: string;
  url: string;
}

export class ListEndpoints {
  execute(config: RelayConfig): EndpointRow[] {
    return config.registers.map((register) => ({
      method: register.method,
      endpoint: register.endpoint,
      targetMethod: register.target.method,
      url: register.target.url,
    }));
  }
}

export const formatEndpointTable = (rows: EndpointRow[]): string[] => {
  const line = (method: string, endpoint: string, target: string, url: string) =>
    `${method.padEnd(8)} ${endpoint.padEnd(30)} ${target.padEnd(8)} ${url}`;

  return [
    line("METHOD", "ENDPOINT", "TARGET", "URL"),
    "-".repeat(80),
    ...rows.map((row) => line(row.method, row.endpoint, row.targetMethod, row.url)),
  ];
};

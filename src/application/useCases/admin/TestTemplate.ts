/**
 * Use case: TestTemplate
 *
 * Dry-runs one endpoint's template against a sample payload, the same way the
 * dispatch pipeline would, without forwarding anything.
 */

import type { RelayConfig } from "../../../config/relayConfig";
import { JsonValue, parseJson } from "../../../domain/entities/JsonValue";
import {
  InvalidInboundJsonError,
  RelayConfigError,
  RenderedPayloadNotJsonError,
  describeError,
} from "../../../domain/errors/RelayErrors";
import { toTemplateData } from "../../../domain/services/TemplateData";
import type { TemplateRendererPort } from "../../../ports/TemplateRendererPort";

export interface TestTemplateInput {
  endpoint: string;
  payload: string;
}

export interface TestTemplateOutput {
  rendered: string;
  // Present only when the rendered output parses as JSON
  json?: JsonValue;
  jsonError?: string;
}

export class TestTemplate {
  constructor(private readonly renderer: TemplateRendererPort) {}

  execute(config: RelayConfig, input: TestTemplateInput): TestTemplateOutput {
    const register = config.registers.find((r) => r.endpoint === input.endpoint);
    if (!register) {
      throw new RelayConfigError(`Endpoint '${input.endpoint}' not found`);
    }

    let payload: JsonValue;
    try {
      payload = parseJson(input.payload);
    } catch (error) {
      throw new InvalidInboundJsonError(describeError(error));
    }

    const handle = this.renderer.compile(register.template);
    const rendered = this.renderer.render(handle, toTemplateData(payload));

    try {
      return { rendered, json: parseJson(rendered) };
    } catch (error) {
      return { rendered, jsonError: new RenderedPayloadNotJsonError(describeError(error)).message };
    }
  }
}

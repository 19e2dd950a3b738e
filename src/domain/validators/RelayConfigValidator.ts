/**
 * Load-time checks for the relay configuration.
 *
 * The server refuses to start when `validate` throws; the admin CLI reports
 * the same failure. `warnings` lists problems that only surface per request.
 */

import type { RelayConfig } from "../../config/relayConfig";
import type { TemplateRendererPort } from "../../ports/TemplateRendererPort";
import { isSupportedMethod } from "../entities/WebhookRule";
import { RelayConfigError, describeError } from "../errors/RelayErrors";

export class RelayConfigValidator {
  static validate(config: RelayConfig, renderer: TemplateRendererPort): void {
    const seen = new Map<string, number>();

    config.registers.forEach((register, i) => {
      if (!register.endpoint.startsWith("/")) {
        throw new RelayConfigError(`Register ${i}: endpoint must start with '/'`);
      }

      if (!isSupportedMethod(register.method)) {
        throw new RelayConfigError(`Register ${i}: invalid HTTP method '${register.method}'`);
      }

      if (register.target.url.length === 0) {
        throw new RelayConfigError(`Register ${i}: target URL cannot be empty`);
      }

      if (!URL.canParse(register.target.url)) {
        throw new RelayConfigError(
          `Register ${i}: target URL '${register.target.url}' is not an absolute URL`,
        );
      }

      try {
        renderer.compile(register.template);
      } catch (error) {
        throw new RelayConfigError(`Register ${i}: template error: ${describeError(error)}`);
      }

      const previous = seen.get(register.endpoint);
      if (previous !== undefined) {
        throw new RelayConfigError(
          `Register ${i}: endpoint '${register.endpoint}' is already declared by register ${previous}`,
        );
      }
      seen.set(register.endpoint, i);
    });
  }

  static warnings(config: RelayConfig): string[] {
    return config.registers.flatMap((register, i) =>
      isSupportedMethod(register.target.method)
        ? []
        : [
            `Register ${i}: target method '${register.target.method}' is not supported; requests to ${register.endpoint} will fail`,
          ],
    );
  }
}

import type { RelayConfig } from "../../../config/relayConfig";
import { RelayConfigValidator } from "../../../domain/validators/RelayConfigValidator";
import type { TemplateRendererPort } from "../../../ports/TemplateRendererPort";

export interface ValidateRelayConfigOutput {
  registers: number;
  warnings: string[];
}

export class ValidateRelayConfig {
  constructor(private readonly renderer: TemplateRendererPort) {}

  /** @throws RelayConfigError describing the first invalid register */
  execute(config: RelayConfig): ValidateRelayConfigOutput {
    RelayConfigValidator.validate(config, this.renderer);
    return {
      registers: config.registers.length,
      warnings: RelayConfigValidator.warnings(config),
    };
  }
}

#!/usr/bin/env node
/**
 * hermes-admin: offline checks against a relay configuration file.
 */

import chalk from "chalk";
import { Command } from "commander";
import { formatEndpointTable, ListEndpoints } from "../application/useCases/admin/ListEndpoints";
import { TestTemplate } from "../application/useCases/admin/TestTemplate";
import { ValidateRelayConfig } from "../application/useCases/admin/ValidateRelayConfig";
import { loadRelayConfig } from "../config/relayConfig";
import { SERVICE_VERSION } from "../config/service";
import { stringifyJson } from "../domain/entities/JsonValue";
import { describeError } from "../domain/errors/RelayErrors";
import { HandlebarsTemplateRenderer } from "../infrastructure/templating/HandlebarsTemplateRenderer";

const DEFAULT_CONFIG = "config.yml";

export const buildAdminProgram = (): Command => {
  const program = new Command()
    .name("hermes-admin")
    .description("Administrative tools for the webhook relay")
    .version(SERVICE_VERSION);

  program
    .command("validate-config")
    .description("Validate a relay configuration file")
    .option("-c, --config <path>", "configuration file path", DEFAULT_CONFIG)
    .action(async (opts: { config: string }) => {
      console.log(chalk.cyan(`🔍 Validating configuration: ${opts.config}`));
      const config = await loadRelayConfig(opts.config);
      const result = new ValidateRelayConfig(new HandlebarsTemplateRenderer()).execute(config);
      for (const warning of result.warnings) {
        console.log(chalk.yellow(`⚠️  ${warning}`));
      }
      console.log(chalk.green(`✅ Configuration is valid (${result.registers} registers)`));
    });

  program
    .command("test-template")
    .description("Render an endpoint's template against a sample payload")
    .option("-c, --config <path>", "configuration file path", DEFAULT_CONFIG)
    .requiredOption("-e, --endpoint <endpoint>", "endpoint to test")
    .requiredOption("-p, --payload <json>", "JSON payload")
    .action(async (opts: { config: string; endpoint: string; payload: string }) => {
      const config = await loadRelayConfig(opts.config);
      const result = new TestTemplate(new HandlebarsTemplateRenderer()).execute(config, {
        endpoint: opts.endpoint,
        payload: opts.payload,
      });

      console.log(chalk.cyan("📝 Template output:"));
      console.log(result.rendered);
      if (result.json !== undefined) {
        console.log(chalk.green("✅ Output is valid JSON:"));
        console.log(stringifyJson(result.json, 2));
      } else {
        console.log(chalk.red(`❌ ${result.jsonError ?? "Output is not valid JSON"}`));
        process.exitCode = 1;
      }
    });

  program
    .command("list-endpoints")
    .description("List configured endpoints")
    .option("-c, --config <path>", "configuration file path", DEFAULT_CONFIG)
    .action(async (opts: { config: string }) => {
      const config = await loadRelayConfig(opts.config);
      console.log(chalk.cyan(`📋 Configured endpoints (${config.registers.length}):`));
      for (const line of formatEndpointTable(new ListEndpoints().execute(config))) {
        console.log(line);
      }
    });

  return program;
};

if (process.env.NODE_ENV !== "test") {
  buildAdminProgram()
    .parseAsync(process.argv)
    .catch((err) => {
      console.error(chalk.red(`❌ ${describeError(err)}`));
      process.exit(1);
    });
}

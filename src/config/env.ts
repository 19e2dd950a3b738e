import { Command, Option } from "commander";
import { z } from "zod";
import { SERVICE_NAME, SERVICE_VERSION } from "./service";

const booleanFlag = z
  .union([z.boolean(), z.enum(["true", "false"])])
  .transform((v) => v === true || v === "true");

const processConfigSchema = z.object({
  config: z.string().min(1),
  bindAddress: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  logLevel: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])),
  logFormat: z.enum(["json", "pretty"]),
  requestTimeout: z.coerce.number().int().positive(),
  maxConcurrentRequests: z.coerce.number().int().positive(),
  healthCheckEnabled: booleanFlag,
});

export type ProcessConfig = z.infer<typeof processConfigSchema>;

export class ProcessConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProcessConfigError";
  }
}

/**
 * Server flags. Every flag falls back to its HERMES_* variable, then to the default.
 */
export const buildServerCommand = (): Command =>
  new Command()
    .name(SERVICE_NAME)
    .description("Configuration-driven webhook relay")
    .version(SERVICE_VERSION)
    .addOption(
      new Option("-c, --config <path>", "configuration file path")
        .env("HERMES_CONFIG_PATH")
        .default("config.yml"),
    )
    .addOption(
      new Option("--bind-address <address>", "server bind address")
        .env("HERMES_BIND_ADDRESS")
        .default("0.0.0.0"),
    )
    .addOption(new Option("-p, --port <port>", "server port").env("HERMES_PORT").default("3000"))
    .addOption(
      new Option("--log-level <level>", "log level").env("HERMES_LOG_LEVEL").default("info"),
    )
    .addOption(
      new Option("--log-format <format>", "log format")
        .choices(["json", "pretty"])
        .env("HERMES_LOG_FORMAT")
        .default("pretty"),
    )
    .addOption(
      new Option("--request-timeout <seconds>", "outbound request timeout in seconds")
        .env("HERMES_REQUEST_TIMEOUT")
        .default("30"),
    )
    .addOption(
      new Option("--max-concurrent-requests <count>", "maximum concurrent connections")
        .env("HERMES_MAX_CONCURRENT_REQUESTS")
        .default("1000"),
    )
    .addOption(
      new Option("--health-check-enabled <enabled>", "serve /health and /ready")
        .choices(["true", "false"])
        .env("HERMES_HEALTH_CHECK_ENABLED")
        .default("true"),
    );

export const parseProcessConfig = (argv: string[], command = buildServerCommand()): ProcessConfig => {
  command.parse(argv, { from: "user" });

  const parsed = processConfigSchema.safeParse(command.opts());
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ProcessConfigError(`Invalid process configuration: ${details}`);
  }
  return parsed.data;
};

import fs from "fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { RelayConfigError, describeError } from "../domain/errors/RelayErrors";

const RetryConfigSchema = z.object({
  attempts: z.number().int().min(0),
  delay_ms: z.number().int().min(0),
  backoff_multiplier: z.number().positive(),
});

const TargetConfigSchema = z.object({
  url: z.string(),
  // Not restricted here: an unsupported verb is reported per request
  method: z.string(),
  headers: z.record(z.string(), z.string()).default({}),
  timeout_seconds: z.number().int().positive().nullish(),
});

const RegisterConfigSchema = z.object({
  endpoint: z.string(),
  method: z.string(),
  target: TargetConfigSchema,
  template: z.string(),
  retry_config: RetryConfigSchema.nullish(),
});

const SettingsSchema = z.object({
  retry_attempts: z.number().int().min(0).default(3),
  retry_delay_ms: z.number().int().min(0).default(1000),
  enable_metrics: z.boolean().default(false),
});

export const RelayConfigSchema = z.object({
  registers: z.array(RegisterConfigSchema),
  settings: SettingsSchema.default({}),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;
export type RegisterConfig = z.infer<typeof RegisterConfigSchema>;
export type RelaySettings = z.infer<typeof SettingsSchema>;

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");

/**
 * Parses YAML relay configuration text. `source` only labels error messages.
 */
export const parseRelayConfig = (text: string, source = "configuration"): RelayConfig => {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new RelayConfigError(`Failed to parse ${source}: ${describeError(error)}`);
  }

  const parsed = RelayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RelayConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const loadRelayConfig = async (path: string): Promise<RelayConfig> => {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (error) {
    throw new RelayConfigError(`Failed to read ${path}: ${describeError(error)}`);
  }
  return parseRelayConfig(text, path);
};

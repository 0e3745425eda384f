import config from 'config';
import { z } from 'zod';

const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
});

const AppInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

const LoggingConfigSchema = z.object({
  namespaces: z.string(),
});

const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  app: AppInfoSchema,
  logging: LoggingConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

type ConfigSource = {
  get(setting: string): unknown;
};

/**
 * Read and validate settings from node-config (`config/*.json`, with
 * overrides from `config/custom-environment-variables.json`).
 */
export const loadAppConfig = (source: ConfigSource = config): AppConfig =>
  AppConfigSchema.parse({
    server: source.get('server'),
    app: source.get('app'),
    logging: source.get('logging'),
  });

export { AppConfigSchema };

import { type ConfigSource, EnvSource, loadConfig, ObjectSource } from "@mailtask/config"
import { type EnvConfig, envSchema, type MailSendConfig } from "./schema"

export function mapEnvToConfig(env: Readonly<EnvConfig>): MailSendConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    templates: {
      ...(env.MAIL_TEMPLATES_DIR !== undefined && { rootDir: env.MAIL_TEMPLATES_DIR }),
    },
    storage: {
      rootDir: env.STORAGE_ROOT_DIR,
      uriScheme: env.STORAGE_URI_SCHEME,
    },
  }
}

/**
 * Reads process configuration from `env`, then `overrides` (later wins).
 * Override keys use the environment variable names.
 */
export async function loadMailSendConfig(
  env: Record<string, string | undefined> = process.env,
  overrides?: Partial<Record<keyof EnvConfig, unknown>>,
): Promise<MailSendConfig> {
  const sources: ConfigSource[] = [
    new EnvSource({ env }),
    ...(overrides ? [new ObjectSource(overrides)] : []),
  ]

  return mapEnvToConfig(await loadConfig({ schema: envSchema, sources }))
}

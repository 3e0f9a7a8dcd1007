import { type LogLevelName, logLevelNames } from "@mailtask/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("mail-send"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),

  MAIL_TEMPLATES_DIR: z.string().optional(),

  STORAGE_ROOT_DIR: z.string().default("./storage"),
  STORAGE_URI_SCHEME: z
    .string()
    .regex(/^[a-z][a-z0-9+.-]*$/, "must be a lowercase URI scheme")
    .default("storage"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type MailSendConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  templates: {
    /** Defaults to the templates bundled with this package. */
    rootDir?: string
  }

  storage: {
    rootDir: string
    uriScheme: string
  }
}

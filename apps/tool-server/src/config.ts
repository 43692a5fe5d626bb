import {LogLevelSchema, type LogLevel} from '@signed-api-tools/logging'
import {z} from 'zod'

import {ConfigurationError} from './errors'

export const FEATURE_FLAG_ENV_PREFIX = 'API_FEATURE_'
export const LEGACY_FEATURE_FLAG_ENV_PREFIX = 'ABS_FEATURE_'
export const DEFAULT_FEATURE_FLAGS: Readonly<Record<string, boolean>> = Object.freeze({'device-reporting': true})

const toNumber = (value: unknown) => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value
  }

  const parsed = Number(value.trim())
  return Number.isNaN(parsed) ? value : parsed
}

const numberFromEnv = z.preprocess(toNumber, z.number().int().positive())
const portFromEnv = z.preprocess(toNumber, z.number().int().positive().max(65_535))

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no' || normalized.length === 0) {
    return false
  }

  return value
}, z.boolean())

const requiredString = (name: string) =>
  z
    .string({error: `${name} is required`})
    .trim()
    .min(1, `${name} is required`)

const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal'
}

const logLevelFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value
  }

  const normalized = value.trim().toLowerCase()
  return LOG_LEVEL_ALIASES[normalized] ?? normalized
}, LogLevelSchema)

export const TransportModeSchema = z.enum(['http', 'stdio', 'sse'])
export type TransportMode = z.infer<typeof TransportModeSchema>

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    API_HOST: requiredString('API_HOST').refine(value => {
      try {
        const parsed = new URL(value)
        return parsed.protocol === 'http:' || parsed.protocol === 'https:'
      } catch {
        return false
      }
    }, 'API_HOST must be an absolute http(s) URL'),
    API_KEY: requiredString('API_KEY'),
    API_SECRET: requiredString('API_SECRET'),
    HTTP_TIMEOUT_SECONDS: numberFromEnv.default(30),
    SERVER_HOST: z.string().trim().min(1).default('0.0.0.0'),
    SERVER_PORT: portFromEnv.default(8000),
    LOG_LEVEL: logLevelFromEnv.default('info'),
    TRANSPORT_MODE: z.preprocess(
      value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      TransportModeSchema
    ).default('http'),
    DISABLE_ADVANCED_API_BLOCKLIST: booleanFromEnv.default(false),
    OPENAPI_SPEC_PATH: z.string().trim().startsWith('/').default('/api-doc/spec/openapi.json')
  })
  .strict()

export type ServiceConfig = {
  nodeEnv: 'development' | 'test' | 'production'
  apiHost: string
  apiKey: string
  apiSecret: string
  httpTimeoutMs: number
  host: string
  port: number
  logLevel: LogLevel
  transportMode: TransportMode
  advancedApiBlocklistEnabled: boolean
  openApiSpecUrl: string
  featureFlags: Record<string, boolean>
}

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  API_HOST: env.API_HOST,
  API_KEY: env.API_KEY,
  API_SECRET: env.API_SECRET,
  HTTP_TIMEOUT_SECONDS: env.HTTP_TIMEOUT_SECONDS,
  SERVER_HOST: env.SERVER_HOST,
  SERVER_PORT: env.SERVER_PORT,
  LOG_LEVEL: env.LOG_LEVEL,
  TRANSPORT_MODE: env.TRANSPORT_MODE,
  DISABLE_ADVANCED_API_BLOCKLIST: env.DISABLE_ADVANCED_API_BLOCKLIST,
  OPENAPI_SPEC_PATH: env.OPENAPI_SPEC_PATH
})

const readFlagsWithPrefix = (env: NodeJS.ProcessEnv, prefix: string, flags: Record<string, boolean>) => {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined) {
      continue
    }

    const groupName = key.slice(prefix.length).toLowerCase().replace(/_/gu, '-')
    if (groupName.length === 0) {
      continue
    }

    flags[groupName] = value.trim().toLowerCase() === 'enabled'
  }
}

/**
 * Reads `API_FEATURE_<GROUP>` variables. `API_FEATURE_DEVICE_REPORTING=enabled`
 * yields `{"device-reporting": true}`; any other value disables the group.
 * `ABS_FEATURE_<GROUP>` is still honoured; for the same group the
 * `API_FEATURE_` variable wins. With no such variable at all, only
 * `device-reporting` is enabled.
 */
export const parseFeatureFlags = (env: NodeJS.ProcessEnv): Record<string, boolean> => {
  const flags: Record<string, boolean> = {}
  readFlagsWithPrefix(env, LEGACY_FEATURE_FLAG_ENV_PREFIX, flags)
  readFlagsWithPrefix(env, FEATURE_FLAG_ENV_PREFIX, flags)

  return Object.keys(flags).length === 0 ? {...DEFAULT_FEATURE_FLAGS} : flags
}

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => {
  const parsed = envSchema.safeParse(toEnvInput(env))
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`)
  }

  const apiHost = parsed.data.API_HOST.replace(/\/+$/u, '')

  return {
    nodeEnv: parsed.data.NODE_ENV,
    apiHost,
    apiKey: parsed.data.API_KEY,
    apiSecret: parsed.data.API_SECRET,
    httpTimeoutMs: parsed.data.HTTP_TIMEOUT_SECONDS * 1000,
    host: parsed.data.SERVER_HOST,
    port: parsed.data.SERVER_PORT,
    logLevel: parsed.data.LOG_LEVEL,
    transportMode: parsed.data.TRANSPORT_MODE,
    advancedApiBlocklistEnabled: !parsed.data.DISABLE_ADVANCED_API_BLOCKLIST,
    openApiSpecUrl: `${apiHost}${parsed.data.OPENAPI_SPEC_PATH}`,
    featureFlags: parseFeatureFlags(env)
  }
}

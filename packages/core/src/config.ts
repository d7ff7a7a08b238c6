import * as path from 'node:path'
import { randomBytes } from 'node:crypto'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'

export interface RateLimitRule {
  max: number
  windowSeconds: number
}

export type RateLimitBucket = 'auth' | 'passwordReset' | 'api' | 'uploads'

export interface LogConfig {
  level: string
  pretty: boolean
}

export interface AuthConfig {
  jwtSecret: string
  accessTokenTtlSeconds: number
  refreshTokenTtlSeconds: number
  passwordResetTtlSeconds: number
  emailVerificationTtlSeconds: number
}

export interface HomeroomConfig {
  dataDir: string
  server: {
    host: string
    port: number
    corsOrigin: boolean | string | string[]
  }
  database: { path: string }
  uploads: { dir: string }
  auth: AuthConfig
  rateLimits: Record<RateLimitBucket, RateLimitRule>
  log: LogConfig
  mail: { from: string }
  publicUrl: string
  /** Non-fatal problems found while loading (reported once a logger exists) */
  warnings: string[]
}

const CONFIG_FILENAME = 'config.yaml'

export const DEFAULT_RATE_LIMITS: Record<RateLimitBucket, RateLimitRule> = {
  auth: { max: 5, windowSeconds: 900 },
  passwordReset: { max: 3, windowSeconds: 3600 },
  api: { max: 1000, windowSeconds: 3600 },
  uploads: { max: 50, windowSeconds: 3600 },
}

const rateLimitRuleSchema = z.object({
  max: z.number().int().positive(),
  windowSeconds: z.number().int().positive(),
})

const yamlConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string(),
        port: z.number().int().min(0).max(65535),
        corsOrigin: z.union([z.boolean(), z.string(), z.array(z.string())]),
      })
      .partial(),
    database: z.object({ path: z.string() }).partial(),
    uploads: z.object({ dir: z.string() }).partial(),
    auth: z
      .object({
        jwtSecret: z.string().min(1),
        accessTokenTtlSeconds: z.number().int().positive(),
        refreshTokenTtlSeconds: z.number().int().positive(),
        passwordResetTtlSeconds: z.number().int().positive(),
        emailVerificationTtlSeconds: z.number().int().positive(),
      })
      .partial(),
    rateLimits: z
      .object({
        auth: rateLimitRuleSchema,
        passwordReset: rateLimitRuleSchema,
        api: rateLimitRuleSchema,
        uploads: rateLimitRuleSchema,
      })
      .partial(),
    log: z.object({ level: z.string(), pretty: z.boolean() }).partial(),
    mail: z.object({ from: z.string() }).partial(),
    publicUrl: z.string(),
  })
  .partial()

type YamlConfig = z.infer<typeof yamlConfigSchema>

export interface LoadConfigOptions {
  /** Defaults to HOMEROOM_DATA_DIR, then ./.homeroom */
  dataDir?: string
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv
}

function loadYamlConfig(dataDir: string, warnings: string[]): YamlConfig {
  const configPath = path.join(dataDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    const raw: unknown = parse(readFileSync(configPath, 'utf-8'))
    if (raw === null || raw === undefined) return {}
    const result = yamlConfigSchema.safeParse(raw)
    if (!result.success) {
      const issue = result.error.issues[0]
      warnings.push(
        `Could not use ${configPath}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}. Using defaults.`,
      )
      return {}
    }
    return result.data
  } catch (err) {
    warnings.push(
      `Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined
  const port = Number(raw)
  return Number.isInteger(port) && port >= 0 && port <= 65535 ? port : undefined
}

function parseCorsOrigin(raw: string | undefined): boolean | string | string[] | undefined {
  if (raw === undefined || raw === '') return undefined
  if (raw === 'true') return true
  if (raw === 'false') return false
  const origins = raw.split(',').map((o) => o.trim()).filter(Boolean)
  return origins.length === 1 ? origins[0] : origins
}

/**
 * Load configuration.
 * Precedence: environment > config.yaml > defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): HomeroomConfig {
  const env = options.env ?? process.env
  const dataDir = path.resolve(options.dataDir ?? env.HOMEROOM_DATA_DIR ?? '.homeroom')
  const warnings: string[] = []
  const yaml = loadYamlConfig(dataDir, warnings)
  const production = env.NODE_ENV === 'production'

  let jwtSecret = env.HOMEROOM_JWT_SECRET || yaml.auth?.jwtSecret
  if (!jwtSecret) {
    if (production) {
      throw new Error('HOMEROOM_JWT_SECRET is required when NODE_ENV=production')
    }
    jwtSecret = randomBytes(32).toString('hex')
    warnings.push('No JWT secret configured; using a random per-process secret. Tokens will not survive a restart.')
  }

  return {
    dataDir,
    server: {
      host: env.HOST || yaml.server?.host || '0.0.0.0',
      port: parsePort(env.PORT) ?? yaml.server?.port ?? 4000,
      corsOrigin: parseCorsOrigin(env.HOMEROOM_CORS_ORIGIN) ?? yaml.server?.corsOrigin ?? true,
    },
    database: {
      path: env.HOMEROOM_DB_PATH || yaml.database?.path || path.join(dataDir, 'homeroom.db'),
    },
    uploads: {
      dir: env.HOMEROOM_UPLOAD_DIR || yaml.uploads?.dir || path.join(dataDir, 'uploads'),
    },
    auth: {
      jwtSecret,
      accessTokenTtlSeconds: yaml.auth?.accessTokenTtlSeconds ?? 3600,
      refreshTokenTtlSeconds: yaml.auth?.refreshTokenTtlSeconds ?? 2_592_000,
      passwordResetTtlSeconds: yaml.auth?.passwordResetTtlSeconds ?? 3600,
      emailVerificationTtlSeconds: yaml.auth?.emailVerificationTtlSeconds ?? 86_400,
    },
    rateLimits: {
      ...DEFAULT_RATE_LIMITS,
      ...(yaml.rateLimits ?? {}),
    },
    log: {
      level: env.HOMEROOM_LOG_LEVEL || yaml.log?.level || 'info',
      pretty: yaml.log?.pretty ?? !production,
    },
    mail: {
      from: env.HOMEROOM_MAIL_FROM || yaml.mail?.from || 'no-reply@homeroom.local',
    },
    publicUrl: env.HOMEROOM_PUBLIC_URL || yaml.publicUrl || 'http://localhost:4000',
    warnings,
  }
}

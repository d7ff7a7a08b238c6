import { pino, type Logger } from 'pino'
import type { LogConfig } from './config.js'

export type { Logger }

/** Paths scrubbed from every log line */
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'password',
  'current_password',
  'new_password',
  'refresh_token',
  'access_token',
  'token',
  '*.password',
  '*.refresh_token',
  '*.access_token',
  '*.token',
]

export function createLogger(config: LogConfig): Logger {
  return pino({
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    ...(config.pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  })
}

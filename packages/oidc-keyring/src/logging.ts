/**
 * Structured logging for oidc-keyring.
 *
 * Logs are JSON lines on stderr. The level comes from
 * `OIDC_KEYRING_LOG_LEVEL` and defaults to `silent`.
 */

import pino, { type Logger } from 'pino'

export type { Logger }

/** Log levels accepted in `OIDC_KEYRING_LOG_LEVEL`. */
export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']

/** Paths censored in every log record. Private JWK members never reach the log. */
export const REDACTION_PATHS: string[] = [
  'privateJwk',
  '*.privateJwk',
  'token',
  '*.token',
  'credential',
  '*.credential',
  'key.d',
  'key.p',
  'key.q',
  'key.dp',
  'key.dq',
  'key.qi',
]

let rootLogger: Logger | undefined

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Resolve the log level from the environment. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.OIDC_KEYRING_LOG_LEVEL?.trim().toLowerCase()
  if (level !== undefined && isLogLevel(level)) {
    return level
  }
  return 'silent'
}

/** Return the process-wide root logger, creating it on first use. */
export function getRootLogger(): Logger {
  rootLogger ??= pino(
    {
      level: resolveLogLevel(),
      redact: { paths: REDACTION_PATHS, censor: '[REDACTED]' },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true }),
  )
  return rootLogger
}

/** Create a child logger bound to a component name. */
export function createLogger(component: string): Logger {
  return getRootLogger().child({ component })
}

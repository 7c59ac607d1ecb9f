import pino from 'pino'
import type { DestinationStream, Logger } from 'pino'
import { ConfigError, loadConfig, type CollectdConfig } from './config'

export type { Logger }

export function createLogger(
  config: Pick<CollectdConfig, 'logLevel'>,
  destination?: DestinationStream,
): Logger {
  const options = { name: 'collectd-wire', level: config.logLevel }
  return destination ? pino(options, destination) : pino(options)
}

let defaultLogger: Logger | null = null

/**
 * The shared logger, built from the environment on first use. An invalid
 * `COLLECTD_LOG_LEVEL` falls back to `info` and is reported as a warning.
 */
export function getLogger(): Logger {
  if (defaultLogger) return defaultLogger

  try {
    defaultLogger = createLogger(loadConfig())
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err
    defaultLogger = createLogger({ logLevel: 'info' })
    defaultLogger.warn({ issues: err.issues }, 'invalid logging configuration, using info')
  }
  return defaultLogger
}

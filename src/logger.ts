/**
 * Structured logger — pino-backed with a small `log.info(tag, msg)` facade.
 *
 * In production (NODE_ENV=production), emits newline-delimited JSON.
 * In development, pipes through pino-pretty for human-readable output.
 * Under Vitest the logger is silent unless LOG_LEVEL says otherwise.
 *
 * Usage:
 *   import { log } from './logger.js'
 *   log.info('pipeline', `Scored ${n} wallets`)
 *   log.error('loader', 'Unreadable input', err)
 *
 * Hot-path stages can bind the tag once:
 *   const clog = childLogger('cluster')
 *   clog.debug({ eps }, 'running dbscan')
 */

import pino from 'pino'

const isProduction = process.env.NODE_ENV === 'production'
const isTest = !!process.env.VITEST

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isProduction || isTest) return undefined
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
    },
  }
}

const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  transport: buildTransport(),
})

/** Create a child logger bound to a tag. */
export function childLogger(tag: string): pino.Logger {
  return baseLogger.child({ tag })
}

export const log = {
  debug(tag: string, msg: string) {
    baseLogger.debug({ tag }, msg)
  },
  info(tag: string, msg: string) {
    baseLogger.info({ tag }, msg)
  },
  warn(tag: string, msg: string, extra?: unknown) {
    if (extra !== undefined) {
      baseLogger.warn({ tag, error: extra instanceof Error ? extra.message : String(extra) }, msg)
    } else {
      baseLogger.warn({ tag }, msg)
    }
  },
  error(tag: string, msg: string, extra?: unknown) {
    if (extra instanceof Error) {
      baseLogger.error({ tag, err: extra }, msg)
    } else if (extra !== undefined) {
      baseLogger.error({ tag, error: String(extra) }, msg)
    } else {
      baseLogger.error({ tag }, msg)
    }
  },
}


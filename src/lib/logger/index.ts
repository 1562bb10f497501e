import { AsyncLocalStorage } from 'node:async_hooks'
import pino from 'pino'
import { env } from '@env/index'

interface LogContext {
  jobId?: string
}

const logContext = new AsyncLocalStorage<LogContext>()

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'geo-batch-adapter' },
  // Tags every line emitted inside runWithJobId with the provider job id
  mixin() {
    return logContext.getStore() ?? {}
  },
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
})

export function runWithJobId<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
  const parent = logContext.getStore() ?? {}

  return logContext.run({ ...parent, jobId }, fn)
}

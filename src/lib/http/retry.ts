import { isAxiosError } from 'axios'
import { logger } from '@lib/logger'
import { Sleeper, sleep as defaultSleep } from '@lib/time/sleep'

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries: number
  backoffMs?: number
  sleep?: Sleeper
  /** Included in the retry log lines. */
  operation?: string
}

const DEFAULT_BACKOFF_MS = 200

/**
 * Network failures, 5xx and 429 are transient. Everything else is returned
 * to the caller on the first attempt.
 */
export function isRetryableHttpError(error: unknown): boolean {
  if (!isAxiosError(error)) {
    return false
  }

  const status = error.response?.status

  return !error.response || (typeof status === 'number' && (status >= 500 || status === 429))
}

/**
 * Runs an idempotent request, retrying transient failures with exponential backoff.
 */
export async function withRetry<T>(request: () => Promise<T>, options: RetryOptions): Promise<T> {
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS
  const sleep = options.sleep ?? defaultSleep

  for (let attempt = 0; ; attempt++) {
    try {
      return await request()
    } catch (error) {
      if (!isRetryableHttpError(error) || attempt >= options.maxRetries) {
        throw error
      }

      const delay = backoffMs * Math.pow(2, attempt)
      logger.warn(
        {
          operation: options.operation,
          attempt: attempt + 1,
          delay,
          status: isAxiosError(error) ? error.response?.status : undefined,
        },
        'Retrying request to geolocation service',
      )

      await sleep(delay)
    }
  }
}

import { isAxiosError } from 'axios'
import { logger } from './index'

/**
 * Logs an error with a stable shape. Axios errors are reduced to status,
 * url and message so request bodies and credentials never reach the logs.
 */
export function logError(error: unknown, context: Record<string, unknown>, msg: string): void {
  if (isAxiosError(error)) {
    logger.error(
      {
        ...context,
        status: error.response?.status,
        url: error.config?.url,
        code: error.code,
        error: error.message,
      },
      msg,
    )
    return
  }

  if (error instanceof Error) {
    logger.error({ ...context, err: error }, msg)
    return
  }

  logger.error({ ...context, error: String(error) }, msg)
}

import { logger } from '@lib/logger'
import { Sleeper, sleep as defaultSleep } from '@lib/time/sleep'
import { BatchJobStatus, isTerminalStatus } from './bulk-geocoder.interface'
import { StalledBatchJobError } from './error/stalled-batch-job-error'

export interface BatchJobPollerConfig {
  maxStalledRetries: number
  pollIntervalMs: number
  sleep?: Sleeper
}

export interface PollState {
  lastProcessed: number
  stalledRetries: number
}

export const INITIAL_POLL_STATE: PollState = { lastProcessed: 0, stalledRetries: 0 }

/**
 * Folds one status report into the poll state. A report without progress
 * counts as a stall; any progress resets the counter.
 */
export function advancePollState(state: PollState, status: BatchJobStatus, maxStalledRetries: number): PollState {
  if (status.processedCount !== state.lastProcessed) {
    return { lastProcessed: status.processedCount, stalledRetries: 0 }
  }

  const stalledRetries = state.stalledRetries + 1

  if (stalledRetries > maxStalledRetries) {
    throw new StalledBatchJobError(status.jobId, stalledRetries)
  }

  return { lastProcessed: state.lastProcessed, stalledRetries }
}

export type FetchJobStatus = (jobId: string) => Promise<BatchJobStatus>

/**
 * Polls a batch job until it reaches a terminal status. The first query is
 * immediate; later ones wait `pollIntervalMs` after the previous answer.
 */
export class BatchJobPoller {
  private readonly sleep: Sleeper

  constructor(
    private readonly fetchStatus: FetchJobStatus,
    private readonly config: BatchJobPollerConfig,
  ) {
    this.sleep = config.sleep ?? defaultSleep
  }

  async waitForCompletion(jobId: string): Promise<BatchJobStatus> {
    let state = INITIAL_POLL_STATE

    while (true) {
      const status = await this.fetchStatus(jobId)

      state = advancePollState(state, status, this.config.maxStalledRetries)

      if (isTerminalStatus(status.status)) {
        logger.info(
          { status: status.status, processed: status.processedCount, total: status.totalCount },
          'Batch job reached a terminal status',
        )
        return status
      }

      logger.debug(
        {
          status: status.status,
          processed: status.processedCount,
          total: status.totalCount,
          stalledRetries: state.stalledRetries,
        },
        'Batch job still running',
      )

      await this.sleep(this.config.pollIntervalMs)
    }
  }
}

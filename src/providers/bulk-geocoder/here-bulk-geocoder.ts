import { AxiosInstance } from 'axios'
import { messages } from '@constants/messages'
import { logger, runWithJobId } from '@lib/logger'
import { Sleeper } from '@lib/time/sleep'
import { CredentialsProvider } from '@providers/credentials/credentials-provider.interface'
import {
  errorResult,
  GeocodeResult,
  GeocodingProvider,
  SearchRequest,
} from '@providers/geo-provider/geo-provider.interface'
import { encodeBatchPayload } from './batch-payload-encoder'
import { readResultArchive } from './batch-result-archive'
import { BatchJobPoller } from './batch-job-poller'
import { BatchJobStatus, BulkGeocoder, GeocodeStrategy } from './bulk-geocoder.interface'
import { BatchTooLargeError } from './error/batch-too-large-error'
import { DuplicateSearchIdError } from './error/duplicate-search-id-error'
import { HereBatchJobClient } from './here-batch-job-client'
import { SerialGeocodeExecutor } from './serial-geocode-executor'

export interface HereBulkGeocoderConfig {
  batchUrl: string
  credentials: CredentialsProvider
  /** Used below `minBatchedSearch` searches. */
  serialGeocoder: GeocodingProvider
  minBatchedSearch?: number
  maxBatchSize?: number
  maxStalledRetries?: number
  pollIntervalMs?: number
  maxRetries?: number
  connectTimeoutMs?: number
  readTimeoutMs?: number
  http?: AxiosInstance
  sleep?: Sleeper
}

export const MIN_BATCHED_SEARCH = 100
export const MAX_BATCH_SIZE = 1_000_000
export const MAX_STALLED_RETRIES = 100
export const BATCH_POLL_INTERVAL_MS = 5000

/**
 * Geocodes search lists through the HERE batch jobs API, or one by one when
 * the list is too small for a job to pay off. Both HERE generations share
 * this class; they differ only in `batchUrl` and `credentials`.
 */
export class HereBulkGeocoder implements BulkGeocoder {
  private readonly client: HereBatchJobClient
  private readonly poller: BatchJobPoller
  private readonly serial: SerialGeocodeExecutor

  private readonly minBatchedSearch: number
  private readonly maxBatchSize: number

  constructor(config: HereBulkGeocoderConfig) {
    this.minBatchedSearch = config.minBatchedSearch ?? MIN_BATCHED_SEARCH
    this.maxBatchSize = config.maxBatchSize ?? MAX_BATCH_SIZE

    this.client = new HereBatchJobClient({
      batchUrl: config.batchUrl,
      credentials: config.credentials,
      maxRetries: config.maxRetries,
      connectTimeoutMs: config.connectTimeoutMs,
      readTimeoutMs: config.readTimeoutMs,
      http: config.http,
      sleep: config.sleep,
    })

    this.poller = new BatchJobPoller((jobId) => this.client.status(jobId), {
      maxStalledRetries: config.maxStalledRetries ?? MAX_STALLED_RETRIES,
      pollIntervalMs: config.pollIntervalMs ?? BATCH_POLL_INTERVAL_MS,
      sleep: config.sleep,
    })

    this.serial = new SerialGeocodeExecutor(config.serialGeocoder)
  }

  decide(searches: readonly SearchRequest[]): GeocodeStrategy {
    return searches.length >= this.minBatchedSearch ? GeocodeStrategy.BATCH : GeocodeStrategy.SERIAL
  }

  async bulkGeocode(searches: readonly SearchRequest[]): Promise<GeocodeResult[]> {
    this.validate(searches)

    if (searches.length === 0) {
      return []
    }

    const strategy = this.decide(searches)
    logger.info({ searches: searches.length, strategy }, 'Starting bulk geocoding')

    if (strategy === GeocodeStrategy.SERIAL) {
      return this.serial.execute(searches)
    }

    return this.batchGeocode(searches)
  }

  private validate(searches: readonly SearchRequest[]): void {
    if (searches.length > this.maxBatchSize) {
      throw new BatchTooLargeError(searches.length, this.maxBatchSize)
    }

    const seen = new Set<string>()
    const duplicated = new Set<string>()

    for (const search of searches) {
      if (seen.has(search.id)) {
        duplicated.add(search.id)
      }
      seen.add(search.id)
    }

    if (duplicated.size > 0) {
      throw new DuplicateSearchIdError([...duplicated])
    }
  }

  private async batchGeocode(searches: readonly SearchRequest[]): Promise<GeocodeResult[]> {
    const jobId = await this.client.submit(encodeBatchPayload(searches))

    return runWithJobId(jobId, async () => {
      logger.info({ searches: searches.length }, 'HERE batch job submitted')

      const finalStatus = await this.poller.waitForCompletion(jobId)
      const results = await this.downloadResults(finalStatus)

      return this.correlate(searches, results)
    })
  }

  /**
   * Only a completed job is expected to have a well-formed archive. For the
   * other terminal states a missing or unreadable archive means no rows.
   */
  private async downloadResults(finalStatus: BatchJobStatus): Promise<GeocodeResult[]> {
    const isCompleted = finalStatus.status === 'completed'

    try {
      const archive = await this.client.download(finalStatus.jobId)
      return readResultArchive(archive)
    } catch (error) {
      if (isCompleted) {
        throw error
      }

      logger.warn(
        { status: finalStatus.status, error: error instanceof Error ? error.message : String(error) },
        'No readable results for unfinished batch job',
      )
      return []
    }
  }

  /**
   * One result per search, in input order. The first answer for an id wins;
   * ids the archive never answered get an error result.
   */
  private correlate(searches: readonly SearchRequest[], results: GeocodeResult[]): GeocodeResult[] {
    const byId = new Map<string, GeocodeResult>()
    let unknownIds = 0

    for (const result of results) {
      if (byId.has(result.id)) {
        continue
      }
      byId.set(result.id, result)
    }

    const requested = new Set(searches.map((search) => search.id))
    for (const id of byId.keys()) {
      if (!requested.has(id)) {
        unknownIds++
      }
    }

    const correlated = searches.map(
      (search) => byId.get(search.id) ?? errorResult(search.id, messages.results.bulkGeocoderMissing),
    )

    const missing = correlated.filter((result) => !byId.has(result.id)).length

    if (missing > 0 || unknownIds > 0) {
      logger.warn({ missing, unknownIds }, 'Batch results did not match the submitted searches')
    }

    return correlated
  }
}

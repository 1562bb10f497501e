import { AxiosInstance, isAxiosError } from 'axios'
import { XMLParser } from 'fast-xml-parser'
import { z } from 'zod'
import { messages } from '@constants/messages'
import { createHttpClient } from '@lib/http/axios'
import { withRetry } from '@lib/http/retry'
import { Sleeper } from '@lib/time/sleep'
import { CredentialsProvider } from '@providers/credentials/credentials-provider.interface'
import { MalformedResultError } from '@use-cases/errors/malformed-result-error'
import { BATCH_DELIMITER } from './batch-payload-encoder'
import { BATCH_OUTPUT_COLUMNS } from './batch-result-codec'
import { BatchJobStatus } from './bulk-geocoder.interface'
import { BulkGeocoderServiceError } from './error/bulk-geocoder-service-error'

export interface HereBatchJobClientConfig {
  batchUrl: string
  credentials: CredentialsProvider
  /** Retries for the idempotent status and download calls. */
  maxRetries?: number
  connectTimeoutMs?: number
  readTimeoutMs?: number
  http?: AxiosInstance
  sleep?: Sleeper
}

const submitResponseSchema = z.object({
  Response: z.object({
    MetaInfo: z.object({
      RequestId: z.string().min(1),
    }),
  }),
})

const statusResponseSchema = z.object({
  Response: z.object({
    Status: z.string().min(1),
    TotalCount: z.coerce.number().int().nonnegative(),
    ProcessedCount: z.coerce.number().int().nonnegative(),
  }),
})

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  removeNSPrefix: true,
  parseTagValue: false,
})

/**
 * Parses an XML body and validates its root element. The root element name
 * differs between endpoints, so the first top-level element that matches the
 * schema wins.
 */
function parseXmlRoot<T>(body: unknown, schema: z.ZodType<T>, context: string): T {
  if (typeof body !== 'string') {
    throw new MalformedResultError(`${context}: expected an XML body.`)
  }

  let document: unknown

  try {
    document = xmlParser.parse(body)
  } catch (error) {
    throw new MalformedResultError(`${context}: invalid XML.`, error)
  }

  if (typeof document === 'object' && document !== null) {
    for (const root of Object.values(document)) {
      const parsed = schema.safeParse(root)
      if (parsed.success) {
        return parsed.data
      }
    }
  }

  throw new MalformedResultError(`${context}: unexpected XML structure.`)
}

function toServiceError(error: unknown, message: string): unknown {
  if (isAxiosError(error)) {
    return new BulkGeocoderServiceError({ status: error.response?.status, body: error.response?.data }, error, message)
  }

  return error
}

/**
 * HTTP side of the HERE batch geocoder jobs API: submit, status and download.
 * https://developer.here.com/documentation/batch-geocoder/
 */
export class HereBatchJobClient {
  private readonly api: AxiosInstance

  private readonly GEN = 8
  private readonly DEFAULT_MAX_RETRIES = 1

  constructor(private readonly config: HereBatchJobClientConfig) {
    this.api =
      config.http ??
      createHttpClient({
        timeout: config.readTimeoutMs,
        connectTimeoutMs: config.connectTimeoutMs,
      })
  }

  /**
   * Starts a job with the encoded payload and returns the provider job id.
   * Never retried: a repeated POST would start a second job.
   */
  async submit(payload: string): Promise<string> {
    let body: unknown

    try {
      const response = await this.api.post<string>(this.config.batchUrl, payload, {
        params: {
          ...this.config.credentials.params(),
          gen: this.GEN,
          action: 'run',
          header: 'true',
          inDelim: BATCH_DELIMITER,
          outDelim: BATCH_DELIMITER,
          outCols: BATCH_OUTPUT_COLUMNS.join(','),
          outputcombined: 'true',
        },
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
        responseType: 'text',
      })
      body = response.data
    } catch (error) {
      throw toServiceError(error, messages.errors.bulkGeocoderService)
    }

    return parseXmlRoot(body, submitResponseSchema, 'HERE batch submit').Response.MetaInfo.RequestId
  }

  async status(jobId: string): Promise<BatchJobStatus> {
    let body: unknown

    try {
      const response = await withRetry(
        () =>
          this.api.get<string>(this.jobUrl(jobId), {
            params: { ...this.config.credentials.params(), action: 'status' },
            responseType: 'text',
          }),
        this.retryOptions('here-batch-status'),
      )
      body = response.data
    } catch (error) {
      throw toServiceError(error, messages.errors.bulkGeocoderStatus)
    }

    const { Response } = parseXmlRoot(body, statusResponseSchema, `HERE batch status for job ${jobId}`)

    return {
      jobId,
      status: Response.Status,
      processedCount: Response.ProcessedCount,
      totalCount: Response.TotalCount,
    }
  }

  /**
   * Fetches the zip archive with every output file of the job.
   */
  async download(jobId: string): Promise<Buffer> {
    try {
      const response = await withRetry(
        () =>
          this.api.get<ArrayBuffer>(`${this.jobUrl(jobId)}/all`, {
            params: this.config.credentials.params(),
            responseType: 'arraybuffer',
          }),
        this.retryOptions('here-batch-download'),
      )

      return Buffer.from(response.data)
    } catch (error) {
      throw toServiceError(error, messages.errors.bulkGeocoderDownload)
    }
  }

  private jobUrl(jobId: string): string {
    return `${this.config.batchUrl}/${encodeURIComponent(jobId)}`
  }

  private retryOptions(operation: string) {
    return {
      maxRetries: this.config.maxRetries ?? this.DEFAULT_MAX_RETRIES,
      sleep: this.config.sleep,
      operation,
    }
  }
}

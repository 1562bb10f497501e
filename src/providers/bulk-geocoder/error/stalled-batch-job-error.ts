import { messages } from '@constants/messages'

export class StalledBatchJobError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly stalledRetries: number,
  ) {
    super(`${messages.errors.bulkGeocoderStalled} ${jobId}`)
    this.name = 'StalledBatchJobError'
  }
}

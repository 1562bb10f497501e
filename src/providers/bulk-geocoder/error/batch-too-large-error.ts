import { messages } from '@constants/messages'

export class BatchTooLargeError extends Error {
  constructor(
    public readonly size: number,
    public readonly maxSize: number,
  ) {
    super(`${messages.validation.batchTooLarge} (${size} > ${maxSize})`)
    this.name = 'BatchTooLargeError'
  }
}

import { messages } from '@constants/messages'

export class MalformedResultError extends Error {
  public readonly originalReason?: unknown

  constructor(detail?: string, reason?: unknown) {
    super(detail ? `${messages.errors.malformedResult} ${detail}` : messages.errors.malformedResult)

    this.name = 'MalformedResultError'
    this.originalReason = reason
  }
}

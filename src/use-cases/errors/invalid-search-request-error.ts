import { messages } from '@constants/messages'

export class InvalidSearchRequestError extends Error {
  constructor(public readonly issues: string[]) {
    super(`${messages.validation.invalidSearchRequest} ${issues.join('; ')}`)
    this.name = 'InvalidSearchRequestError'
  }
}

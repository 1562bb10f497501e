import { messages } from '@constants/messages'

export class MissingCredentialsError extends Error {
  constructor(public readonly scheme: string) {
    super(`${messages.errors.missingCredentials} (${scheme})`)
    this.name = 'MissingCredentialsError'
  }
}

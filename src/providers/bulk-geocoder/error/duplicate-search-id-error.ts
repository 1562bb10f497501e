import { messages } from '@constants/messages'

export class DuplicateSearchIdError extends Error {
  constructor(public readonly duplicateIds: string[]) {
    super(`${messages.validation.duplicateSearchId} Duplicated: ${duplicateIds.join(', ')}`)
    this.name = 'DuplicateSearchIdError'
  }
}

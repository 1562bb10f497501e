import { messages } from '@constants/messages'

export class InvalidRouteOptionError extends Error {
  constructor(public readonly option: string) {
    super(`${messages.validation.invalidRouteOption} Received "${option}".`)
    this.name = 'InvalidRouteOptionError'
  }
}

import { messages } from '@constants/messages'

export class InvalidRouteModeError extends Error {
  constructor(public readonly mode: string) {
    super(`${mode} ${messages.validation.invalidRouteMode}`)
    this.name = 'InvalidRouteModeError'
  }
}

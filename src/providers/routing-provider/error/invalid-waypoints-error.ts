import { messages } from '@constants/messages'

export class InvalidWaypointsError extends Error {
  constructor(public readonly count: number) {
    super(`${messages.validation.invalidWaypoints} Received ${count}.`)
    this.name = 'InvalidWaypointsError'
  }
}

import { messages } from '@constants/messages'
import { ServiceError, ServiceErrorResponse } from '@use-cases/errors/service-error'

export class RoutingServiceError extends ServiceError {
  constructor(response: ServiceErrorResponse, reason?: unknown) {
    super(messages.errors.routingService, response, reason)
    this.name = 'RoutingServiceError'
  }
}

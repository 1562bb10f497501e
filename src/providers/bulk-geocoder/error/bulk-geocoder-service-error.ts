import { messages } from '@constants/messages'
import { ServiceError, ServiceErrorResponse } from '@use-cases/errors/service-error'

export class BulkGeocoderServiceError extends ServiceError {
  constructor(response: ServiceErrorResponse, reason?: unknown, message: string = messages.errors.bulkGeocoderService) {
    super(message, response, reason)
    this.name = 'BulkGeocoderServiceError'
  }
}

export interface ServiceErrorResponse {
  status?: number
  body?: unknown
}

/**
 * A remote service answered with a non-success status. Carries the raw
 * response for diagnostics.
 */
export class ServiceError extends Error {
  public readonly originalReason?: unknown

  constructor(
    message: string,
    public readonly response: ServiceErrorResponse,
    reason?: unknown,
  ) {
    super(response.status !== undefined ? `${message} (status ${response.status})` : message)

    this.name = 'ServiceError'
    this.originalReason = reason
  }
}

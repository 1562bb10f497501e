import { GeocodeResult, SearchRequest } from '@providers/geo-provider/geo-provider.interface'

export enum GeocodeStrategy {
  BATCH = 'BATCH',
  SERIAL = 'SERIAL',
}

export const TERMINAL_JOB_STATUSES = ['completed', 'cancelled', 'deleted', 'failed'] as const

export type TerminalJobStatus = (typeof TERMINAL_JOB_STATUSES)[number]

/**
 * Snapshot of a provider-side batch job. `status` is the raw value the
 * provider reported; anything outside TERMINAL_JOB_STATUSES means running.
 */
export interface BatchJobStatus {
  jobId: string
  status: string
  processedCount: number
  totalCount: number
}

export function isTerminalStatus(status: string): status is TerminalJobStatus {
  return TERMINAL_JOB_STATUSES.some((terminal) => terminal === status)
}

export interface BulkGeocoder {
  decide(searches: readonly SearchRequest[]): GeocodeStrategy
  bulkGeocode(searches: readonly SearchRequest[]): Promise<GeocodeResult[]>
}

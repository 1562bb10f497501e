import AdmZip from 'adm-zip'
import Papa from 'papaparse'
import { logger } from '@lib/logger'
import { logError } from '@lib/logger/helpers'
import { GeocodeResult } from '@providers/geo-provider/geo-provider.interface'
import { MalformedResultError } from '@use-cases/errors/malformed-result-error'
import { BATCH_DELIMITER } from './batch-payload-encoder'
import { BatchResultRow, decodeBatchRow } from './batch-result-codec'

export const RESULT_FILE_SUFFIX = '_out.txt'

/**
 * Decodes the result files of a downloaded job archive. Only entries named
 * `*_out.txt` are read; rows keep their per-file order. A result file that
 * cannot be extracted is skipped, so its ids are left unanswered. The archive
 * is rejected only when none of its result files can be extracted.
 */
export function readResultArchive(archive: Buffer): GeocodeResult[] {
  let zip: AdmZip

  try {
    zip = new AdmZip(archive)
  } catch (error) {
    throw new MalformedResultError('Batch result archive is not a readable zip file.', error)
  }

  const results: GeocodeResult[] = []
  let resultFiles = 0
  let unreadableFiles = 0
  let lastError: unknown

  for (const entry of zip.getEntries()) {
    if (entry.isDirectory || !entry.entryName.endsWith(RESULT_FILE_SUFFIX)) {
      continue
    }

    resultFiles++

    let content: string
    try {
      content = entry.getData().toString('utf8')
    } catch (error) {
      unreadableFiles++
      lastError = error
      logError(error, { file: entry.entryName }, 'Skipping unreadable batch result file')
      continue
    }

    const parsed = Papa.parse<BatchResultRow>(content, {
      header: true,
      delimiter: BATCH_DELIMITER,
      skipEmptyLines: true,
    })

    if (parsed.errors.length > 0) {
      logger.warn(
        { file: entry.entryName, errors: parsed.errors.slice(0, 5).map((e) => `${e.code} (row ${e.row})`) },
        'Batch result file has malformed rows',
      )
    }

    for (const row of parsed.data) {
      const result = decodeBatchRow(row)
      if (result) {
        results.push(result)
      }
    }
  }

  if (resultFiles > 0 && unreadableFiles === resultFiles) {
    throw new MalformedResultError('No result file of the batch archive could be extracted.', lastError)
  }

  return results
}

/**
 * Encoding-resolving CSV loader.
 *
 * Turns a blob of unknown encoding into a Table. The detector's guess is
 * tried first with strict decoding; after that each fallback encoding is
 * tried in a fixed order with lenient decoding (invalid sequences become
 * U+FFFD). The first attempt that yields a header wins.
 */

import { detect } from 'chardet'
import { ApiError, err, ok } from '@csvapi/gateway-core'
import type { Result } from '@csvapi/gateway-core'
import type { Logger } from '@csvapi/observability'
import { Table } from '../table/table'
import { parseCsv } from './csv-parser'

export const FALLBACK_ENCODINGS = ['utf-8', 'latin1', 'iso-8859-1', 'cp1252', 'utf-16', 'ascii'] as const

/** Best-guess encoding name for a blob, or null when it has no guess. */
export type EncodingDetector = (bytes: Uint8Array) => string | null

export interface DecodeAttempt {
  encoding: string
  error: string
}

/**
 * No encoding produced a table. Answered like a missing dataset; the
 * attempts are only logged.
 */
export class DecodeFailure extends ApiError {
  readonly attempts: readonly DecodeAttempt[]

  constructor(attempts: readonly DecodeAttempt[]) {
    super('DECODE_FAILURE', 404, 'No dataset found in storage')
    this.attempts = attempts
  }
}

export interface LoadTableOptions {
  /** Defaults to chardet. `null` skips detection. */
  detector?: EncodingDetector | null
  logger?: Logger
}

function parseWith(bytes: Uint8Array, encoding: string, fatal: boolean): Table {
  const text = new TextDecoder(encoding, { fatal }).decode(bytes)
  const parsed = parseCsv(text)
  return Table.fromRecords(parsed.header, parsed.records, { encoding, droppedRows: parsed.droppedRows })
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function detectEncoding(bytes: Uint8Array, detector: EncodingDetector | null, logger?: Logger): string | null {
  if (!detector) return null
  try {
    return detector(bytes)
  } catch (error) {
    logger?.debug({ err: error }, '[loader] Encoding detection unavailable')
    return null
  }
}

export function loadTable(bytes: Uint8Array, options: LoadTableOptions = {}): Result<Table, DecodeFailure> {
  const { logger } = options
  const attempts: DecodeAttempt[] = []

  const detected = detectEncoding(bytes, options.detector === undefined ? detect : options.detector, logger)
  if (detected) {
    try {
      const table = parseWith(bytes, detected, true)
      logger?.info({ encoding: detected, rows: table.rowCount }, `[loader] Loaded dataset using detected encoding: ${detected}`)
      return ok(table)
    } catch (error) {
      attempts.push({ encoding: detected, error: describeError(error) })
      logger?.warn({ encoding: detected, err: error }, `[loader] Detected encoding ${detected} failed, trying fallback encodings`)
    }
  }

  for (const encoding of FALLBACK_ENCODINGS) {
    try {
      const table = parseWith(bytes, encoding, false)
      logger?.info({ encoding, rows: table.rowCount }, `[loader] Loaded dataset using encoding: ${encoding}`)
      return ok(table)
    } catch (error) {
      attempts.push({ encoding, error: describeError(error) })
    }
  }

  logger?.error({ attempts }, '[loader] Failed to read the CSV file with any encoding')
  return err(new DecodeFailure(attempts))
}

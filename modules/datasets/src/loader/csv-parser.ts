import Papa from 'papaparse'

export interface ParsedCsv {
  header: string[]
  records: string[][]
  droppedRows: number
}

/**
 * Comma-delimited parse of already decoded text. Blank lines are skipped and
 * rows whose field count differs from the header's are dropped. Throws when
 * there is no header or the text holds NUL characters, which is what a
 * multi-byte blob read as a single-byte encoding looks like.
 */
export function parseCsv(text: string): ParsedCsv {
  if (text.includes('\u0000')) throw new Error('line contains NUL')

  const result = Papa.parse<string[]>(text, {
    delimiter: ',',
    header: false,
    skipEmptyLines: true,
  })

  const [header, ...body] = result.data
  if (!header || header.every((field) => field.trim() === '')) {
    throw new Error('No columns to parse from file')
  }

  const records = body.filter((record) => record.length === header.length)
  return { header, records, droppedRows: body.length - records.length }
}

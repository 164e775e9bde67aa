import { describe, it, expect } from 'vitest'
import { createSilentLogger } from '@csvapi/observability'
import { loadTable, DecodeFailure, FALLBACK_ENCODINGS } from '../loader/encoding-loader'
import { summarize } from '../query/dataset-queries'

const logger = createSilentLogger()

function utf16WithBom(text: string): Uint8Array {
  return Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, 'utf16le')])
}

describe('loadTable', () => {
  it('loads a UTF-16 upload', () => {
    const result = loadTable(utf16WithBom('id,name\n1,Ana\n2,Bob\n'), { logger })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(summarize(result.value)).toEqual({
      total_rows: 2,
      total_columns: 2,
      columns: ['id', 'name'],
      data_types: { id: 'int64', name: 'object' },
    })
  })

  it('walks the fallback list past single-byte encodings for UTF-16 input', () => {
    const result = loadTable(utf16WithBom('id,name\n1,Ana\n'), { detector: null, logger })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.source.encoding).toBe('utf-16')
    expect(result.value.columnNames).toEqual(['id', 'name'])
  })

  it('uses the detected encoding when it decodes strictly', () => {
    const bytes = Buffer.from('name,city\nJosé,Málaga\n', 'latin1')
    const result = loadTable(bytes, { detector: () => 'windows-1252', logger })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.source.encoding).toBe('windows-1252')
    expect(result.value.rows).toEqual([['José', 'Málaga']])
  })

  it('decodes leniently with replacement characters in the fallback loop', () => {
    const bytes = Buffer.from('name,city\nJosé,Málaga\n', 'latin1')
    const result = loadTable(bytes, { detector: () => 'utf-8', logger })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.source.encoding).toBe('utf-8')
    expect(result.value.rows).toEqual([['Jos\uFFFD', 'M\uFFFDlaga']])
  })

  it('falls back when the detector names an unsupported encoding or throws', () => {
    const bytes = Buffer.from('a,b\n1,2\n')
    const unknown = loadTable(bytes, { detector: () => 'x-no-such-encoding', logger })
    const broken = loadTable(bytes, { detector: () => { throw new Error('detector crashed') }, logger })
    expect(unknown.ok && unknown.value.source.encoding).toBe('utf-8')
    expect(broken.ok && broken.value.source.encoding).toBe('utf-8')
  })

  it('returns a zero-row table for a header-only file', () => {
    const result = loadTable(Buffer.from('id,name\n'), { detector: null, logger })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.rowCount).toBe(0)
    expect(result.value.columnNames).toEqual(['id', 'name'])
  })

  it('drops rows with the wrong number of fields', () => {
    const result = loadTable(Buffer.from('id,name\n1,Ana\n2,Bob,extra\n3\n4,Dan\n'), { detector: null, logger })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.rows).toEqual([[1, 'Ana'], [4, 'Dan']])
    expect(result.value.source.droppedRows).toBe(2)
    expect(summarize(result.value).total_rows).toBe(2)
  })

  it('fails on empty input after trying every fallback encoding in order', () => {
    const result = loadTable(new Uint8Array(0), { detector: null, logger })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error).toBeInstanceOf(DecodeFailure)
    expect(result.error.attempts.map((a) => a.encoding)).toEqual([...FALLBACK_ENCODINGS])
    expect(result.error.attempts.every((a) => a.error === 'No columns to parse from file')).toBe(true)
    expect(result.error.statusCode).toBe(404)
    expect(result.error.message).toBe('No dataset found in storage')
  })

  it('records a failed detected attempt before the fallbacks', () => {
    const result = loadTable(new Uint8Array(0), { detector: () => 'utf-8', logger })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.attempts).toHaveLength(FALLBACK_ENCODINGS.length + 1)
    expect(result.error.attempts[0].encoding).toBe('utf-8')
  })

  it('is deterministic for the same bytes', () => {
    const bytes = Buffer.from('x,y\n1,a\n2,b\n')
    const first = loadTable(bytes, { logger })
    const second = loadTable(bytes, { logger })
    expect(first.ok && second.ok).toBe(true)
    if (!first.ok || !second.ok) return
    expect(second.value.rows).toEqual(first.value.rows)
    expect(second.value.source.encoding).toBe(first.value.source.encoding)
  })
})

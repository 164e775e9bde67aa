/**
 * Column type inference for decoded CSV text.
 *
 * A column is typed once, at load time, from all of its raw values:
 *   int64   – every value present, integral and exactly representable
 *   float64 – every present value numeric (gaps allowed, all-missing included)
 *   bool    – every value present and a True/False literal
 *   object  – anything else
 */

export type CellValue = string | number | boolean | null

export type ColumnKind = 'numeric' | 'boolean' | 'text'

export type ColumnDtype = 'int64' | 'float64' | 'bool' | 'object'

/** Markers read as a missing value. */
export const MISSING_VALUE_MARKERS: ReadonlySet<string> = new Set([
  '', '#N/A', '#N/A N/A', '#NA', '-1.#IND', '-1.#QNAN', '-NaN', '-nan', '1.#IND', '1.#QNAN',
  '<NA>', 'N/A', 'NA', 'NULL', 'NaN', 'None', 'n/a', 'nan', 'null',
])

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/
const BOOLEANS = new Map<string, boolean>([
  ['True', true], ['true', true], ['TRUE', true],
  ['False', false], ['false', false], ['FALSE', false],
])

export interface TypedColumn {
  kind: ColumnKind
  dtype: ColumnDtype
  cells: CellValue[]
}

function isMissing(raw: string): boolean {
  return MISSING_VALUE_MARKERS.has(raw.trim())
}

function textColumn(raw: readonly string[]): TypedColumn {
  return { kind: 'text', dtype: 'object', cells: raw.map((value) => (isMissing(value) ? null : value)) }
}

export function inferColumn(raw: readonly string[]): TypedColumn {
  if (raw.length === 0) return { kind: 'text', dtype: 'object', cells: [] }

  const present = raw.filter((value) => !isMissing(value)).map((value) => value.trim())
  const complete = present.length === raw.length

  if (complete && present.every((value) => INTEGER.test(value))) {
    const cells = present.map(Number)
    // Past 2^53 a number no longer holds the exact value, keep the digits
    if (!cells.every((value) => Number.isSafeInteger(value))) return textColumn(raw)
    return { kind: 'numeric', dtype: 'int64', cells }
  }

  if (present.every((value) => DECIMAL.test(value))) {
    return {
      kind: 'numeric',
      dtype: 'float64',
      cells: raw.map((value) => (isMissing(value) ? null : Number(value.trim()))),
    }
  }

  if (complete && present.every((value) => BOOLEANS.has(value))) {
    return { kind: 'boolean', dtype: 'bool', cells: raw.map((value) => BOOLEANS.get(value.trim()) ?? null) }
  }

  return textColumn(raw)
}

/** String form of a cell as the column type renders it (`3.0`, `True`). */
export function formatCell(value: CellValue, dtype: ColumnDtype): string | null {
  if (value === null) return null
  if (typeof value === 'boolean') return value ? 'True' : 'False'
  if (typeof value === 'number' && dtype === 'float64' && Number.isInteger(value)) return value.toFixed(1)
  return String(value)
}

/**
 * Makes header names unique in order: blanks become `Unnamed: {i}`, repeats
 * get `.1`, `.2`, ... suffixes.
 */
export function uniqueColumnNames(header: readonly string[]): string[] {
  const seen = new Set<string>()
  return header.map((raw, index) => {
    const base = raw.trim() === '' ? `Unnamed: ${index}` : raw
    let name = base
    for (let n = 1; seen.has(name); n++) name = `${base}.${n}`
    seen.add(name)
    return name
  })
}

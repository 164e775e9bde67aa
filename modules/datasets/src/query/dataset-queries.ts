import { BadRequestError } from '@csvapi/gateway-core'
import type { CellValue, ColumnDtype } from '../table/column-types'
import { formatCell } from '../table/column-types'
import type { ColumnInfo, RowRecord, Table } from '../table/table'

export const DEFAULT_HEAD_ROWS = 5
export const FILTER_RESULT_LIMIT = 50

export type DatasetSummary = {
  total_rows: number
  total_columns: number
  columns: string[]
  data_types: Record<string, ColumnDtype>
}

export type UniqueValues = {
  column: string
  unique_values: CellValue[]
  count: number
}

export function requireColumn(table: Table, name: string): ColumnInfo {
  const column = table.column(name)
  if (!column) throw new BadRequestError(`Column '${name}' not found`)
  return column
}

export function summarize(table: Table): DatasetSummary {
  return {
    total_rows: table.rowCount,
    total_columns: table.columns.length,
    columns: table.columnNames,
    data_types: Object.fromEntries(table.columns.map((column): [string, ColumnDtype] => [column.name, column.dtype])),
  }
}

/** First `n` rows. A negative `n` drops that many rows from the end. */
export function head(table: Table, n = DEFAULT_HEAD_ROWS): RowRecord[] {
  return table.rows.slice(0, n).map((row) => table.toRecord(row))
}

/** Case-insensitive substring match on the rendered cell; missing cells never match. */
export function filterRows(table: Table, columnName: string, value: string, limit = FILTER_RESULT_LIMIT): RowRecord[] {
  const column = requireColumn(table, columnName)
  const needle = value.toLowerCase()
  const matches: RowRecord[] = []

  for (const row of table.rows) {
    if (matches.length >= limit) break
    const rendered = formatCell(row[column.index], column.dtype)
    if (rendered !== null && rendered.toLowerCase().includes(needle)) matches.push(table.toRecord(row))
  }
  return matches
}

/** Distinct values in first-occurrence order. A missing value counts once. */
export function uniqueValues(table: Table, columnName: string): UniqueValues {
  const column = requireColumn(table, columnName)
  const distinct = [...new Set(table.values(column))]
  return { column: column.name, unique_values: distinct, count: distinct.length }
}

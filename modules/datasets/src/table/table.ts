import type { CellValue, ColumnDtype, ColumnKind } from './column-types'
import { inferColumn, uniqueColumnNames } from './column-types'

export interface ColumnInfo {
  name: string
  index: number
  kind: ColumnKind
  dtype: ColumnDtype
}

export type RowRecord = Record<string, CellValue>

export interface TableSource {
  /** Encoding the bytes were decoded with. */
  encoding: string
  /** Data rows skipped for having the wrong number of fields. */
  droppedRows: number
}

/**
 * Decoded, typed CSV. Lives for one request and is never shared.
 */
export class Table {
  readonly columns: readonly ColumnInfo[]
  readonly rows: readonly (readonly CellValue[])[]
  readonly source: TableSource

  private readonly byName: Map<string, ColumnInfo>

  private constructor(columns: ColumnInfo[], rows: CellValue[][], source: TableSource) {
    this.columns = columns
    this.rows = rows
    this.source = source
    this.byName = new Map(columns.map((column): [string, ColumnInfo] => [column.name, column]))
  }

  /** Builds a table from a header and rows that all have the header's width. */
  static fromRecords(header: readonly string[], records: readonly (readonly string[])[], source: TableSource): Table {
    const names = uniqueColumnNames(header)
    const typed = names.map((_, index) => inferColumn(records.map((record) => record[index])))

    const columns = names.map((name, index): ColumnInfo => ({
      name,
      index,
      kind: typed[index].kind,
      dtype: typed[index].dtype,
    }))
    const rows = records.map((_, rowIndex) => typed.map((column) => column.cells[rowIndex]))

    return new Table(columns, rows, source)
  }

  get rowCount(): number {
    return this.rows.length
  }

  get columnNames(): string[] {
    return this.columns.map((column) => column.name)
  }

  column(name: string): ColumnInfo | undefined {
    return this.byName.get(name)
  }

  values(column: ColumnInfo): CellValue[] {
    return this.rows.map((row) => row[column.index])
  }

  toRecord(row: readonly CellValue[]): RowRecord {
    return Object.fromEntries(this.columns.map((column): [string, CellValue] => [column.name, row[column.index]]))
  }
}

import { describe, it, expect } from 'vitest'
import { BadRequestError } from '@csvapi/gateway-core'
import { Table } from '../table/table'
import { summarize, head, filterRows, uniqueValues } from '../query/dataset-queries'

const source = { encoding: 'utf-8', droppedRows: 0 }

function people(): Table {
  return Table.fromRecords(
    ['id', 'name', 'score'],
    [
      ['1', 'John', '3'],
      ['2', 'jojo', '2.5'],
      ['3', 'Bob', ''],
      ['4', 'Ana', '3'],
      ['5', 'Eve', '1'],
      ['6', 'Max', '2'],
      ['7', 'Zoe', '4'],
    ],
    source,
  )
}

describe('summarize', () => {
  it('reports shape and types', () => {
    expect(summarize(people())).toEqual({
      total_rows: 7,
      total_columns: 3,
      columns: ['id', 'name', 'score'],
      data_types: { id: 'int64', name: 'object', score: 'float64' },
    })
  })
})

describe('head', () => {
  it('returns five rows by default', () => {
    const rows = head(people())
    expect(rows).toHaveLength(5)
    expect(rows[0]).toEqual({ id: 1, name: 'John', score: 3 })
  })

  it('returns what exists when n exceeds the row count', () => {
    expect(head(people(), 100)).toHaveLength(7)
  })

  it('drops rows from the end for a negative n', () => {
    expect(head(people(), -5).map((row) => row.id)).toEqual([1, 2])
  })
})

describe('large identifiers', () => {
  it('returns the exact digits through head, filter and unique', () => {
    const table = Table.fromRecords(['id'], [['9007199254740993'], ['12']], source)
    expect(summarize(table).data_types).toEqual({ id: 'object' })
    expect(head(table)).toEqual([{ id: '9007199254740993' }, { id: '12' }])
    expect(filterRows(table, 'id', '740993')).toEqual([{ id: '9007199254740993' }])
    expect(uniqueValues(table, 'id').unique_values).toEqual(['9007199254740993', '12'])
  })
})

describe('filterRows', () => {
  it('matches case-insensitive substrings', () => {
    expect(filterRows(people(), 'name', 'Jo').map((row) => row.name)).toEqual(['John', 'jojo'])
  })

  it('matches the rendered form of numeric cells', () => {
    expect(filterRows(people(), 'score', '3.0').map((row) => row.id)).toEqual([1, 4])
  })

  it('never matches missing cells', () => {
    expect(filterRows(people(), 'score', 'na')).toEqual([])
  })

  it('caps results at 50 rows', () => {
    const records = Array.from({ length: 60 }, (_, i) => [`Jo${i}`])
    const table = Table.fromRecords(['name'], records, source)
    const rows = filterRows(table, 'name', 'jo')
    expect(rows).toHaveLength(50)
    expect(rows[49]).toEqual({ name: 'Jo49' })
  })

  it('rejects unknown columns', () => {
    expect(() => filterRows(people(), 'age', '1')).toThrow(BadRequestError)
    expect(() => filterRows(people(), 'age', '1')).toThrow("Column 'age' not found")
  })
})

describe('uniqueValues', () => {
  it('lists distinct values in first-occurrence order', () => {
    const table = Table.fromRecords(['tag'], [['b'], ['a'], ['b'], [''], ['a']], source)
    expect(uniqueValues(table, 'tag')).toEqual({ column: 'tag', unique_values: ['b', 'a', null], count: 3 })
  })

  it('rejects unknown columns', () => {
    expect(() => uniqueValues(people(), 'nope')).toThrow("Column 'nope' not found")
  })
})

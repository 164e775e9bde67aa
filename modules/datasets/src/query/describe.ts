/**
 * Descriptive statistics per column.
 *
 * Numeric columns (booleans excluded) get count, mean, sample std, min,
 * linear-interpolated quartiles and max. A table without numeric columns
 * describes its text columns instead: count, unique, top, freq.
 */

import type { CellValue } from '../table/column-types'
import type { Table } from '../table/table'

export type NumericStats = {
  count: number
  mean: number | null
  std: number | null
  min: number | null
  '25%': number | null
  '50%': number | null
  '75%': number | null
  max: number | null
}

export type TextStats = {
  count: number
  unique: number
  top: CellValue
  freq: number | null
}

export type DatasetStats = Record<string, NumericStats> | Record<string, TextStats>

function quantile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q
  const lower = Math.floor(position)
  const upper = Math.ceil(position)
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower)
}

export function describeNumbers(values: readonly number[]): NumericStats {
  const count = values.length
  if (count === 0) {
    return { count: 0, mean: null, std: null, min: null, '25%': null, '50%': null, '75%': null, max: null }
  }

  const sorted = [...values].sort((a, b) => a - b)
  const mean = values.reduce((sum, v) => sum + v, 0) / count
  const std = count > 1
    ? Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (count - 1))
    : null

  return {
    count,
    mean,
    std,
    min: sorted[0],
    '25%': quantile(sorted, 0.25),
    '50%': quantile(sorted, 0.5),
    '75%': quantile(sorted, 0.75),
    max: sorted[count - 1],
  }
}

export function describeText(values: readonly CellValue[]): TextStats {
  const counts = new Map<CellValue, number>()
  for (const value of values) {
    if (value !== null) counts.set(value, (counts.get(value) ?? 0) + 1)
  }

  let top: CellValue = null
  let freq: number | null = null
  for (const [value, n] of counts) {
    if (freq === null || n > freq) {
      top = value
      freq = n
    }
  }

  const count = values.filter((value) => value !== null).length
  return { count, unique: counts.size, top, freq }
}

export function describe(table: Table): DatasetStats {
  const numeric = table.columns.filter((column) => column.kind === 'numeric')
  if (numeric.length > 0) {
    return Object.fromEntries(numeric.map((column): [string, NumericStats] => {
      const values = table.values(column).filter((value): value is number => typeof value === 'number')
      return [column.name, describeNumbers(values)]
    }))
  }

  return Object.fromEntries(table.columns.map((column): [string, TextStats] => [column.name, describeText(table.values(column))]))
}

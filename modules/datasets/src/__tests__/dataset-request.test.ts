import { describe, it, expect } from 'vitest'
import { BadRequestError } from '@csvapi/gateway-core'
import {
  datasetQuerySchema, headQuerySchema, filterQuerySchema, columnParamsSchema, parseRequest,
} from '../schemas/dataset-request'

describe('parseRequest', () => {
  it('requires bucket_path', () => {
    expect(() => parseRequest(datasetQuerySchema, {})).toThrow(BadRequestError)
    expect(() => parseRequest(datasetQuerySchema, {})).toThrow('bucket_path parameter is required')
    expect(() => parseRequest(datasetQuerySchema, { bucket_path: '' })).toThrow('bucket_path parameter is required')
    expect(() => parseRequest(datasetQuerySchema, { bucket_path: ['a', 'b'] })).toThrow('bucket_path parameter is required')
  })

  it('reads the head row count with a default of five', () => {
    expect(parseRequest(headQuerySchema, { bucket_path: 'user_1/a.csv', n: '3' })).toEqual({ bucket_path: 'user_1/a.csv', n: 3 })
    expect(parseRequest(headQuerySchema, { bucket_path: 'user_1/a.csv', n: '-2' }).n).toBe(-2)
    expect(parseRequest(headQuerySchema, { bucket_path: 'user_1/a.csv', n: 'abc' }).n).toBe(5)
    expect(parseRequest(headQuerySchema, { bucket_path: 'user_1/a.csv' }).n).toBe(5)
  })

  it('requires both filter parameters', () => {
    expect(() => parseRequest(filterQuerySchema, { bucket_path: 'user_1/a.csv', column: 'name' }))
      .toThrow('Both column and value parameters are required')
    expect(parseRequest(filterQuerySchema, { bucket_path: 'user_1/a.csv', column: 'name', value: 'jo' }))
      .toEqual({ bucket_path: 'user_1/a.csv', column: 'name', value: 'jo' })
  })

  it('reads the column route parameter', () => {
    expect(parseRequest(columnParamsSchema, { column: 'city' })).toEqual({ column: 'city' })
  })
})

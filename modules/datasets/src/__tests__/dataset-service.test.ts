import { describe, it, expect } from 'vitest'
import { DatasetNotFoundError, StorageUnavailableError } from '@csvapi/gateway-core'
import { createSilentLogger } from '@csvapi/observability'
import { fetchTable, listTenantDatasets } from '../storage/dataset-service'
import { MemoryStorage } from '../storage/memory-storage'
import type { ObjectStorage } from '../storage/object-storage'
import { DecodeFailure } from '../loader/encoding-loader'

const logger = createSilentLogger()

function failingStorage(error: Error): ObjectStorage {
  return {
    name: 'failing',
    download: async () => { throw error },
    list: async () => { throw error },
    ping: async () => { throw error },
  }
}

describe('fetchTable', () => {
  it('loads a stored dataset', async () => {
    const storage = new MemoryStorage()
    storage.put('user_1/people.csv', 'id,name\n1,Ana\n')
    const table = await fetchTable(storage, 'user_1/people.csv', { logger })
    expect(table.columnNames).toEqual(['id', 'name'])
    expect(table.rowCount).toBe(1)
  })

  it('reports a missing object as not found', async () => {
    await expect(fetchTable(new MemoryStorage(), 'user_1/nope.csv', { logger })).rejects.toBeInstanceOf(DatasetNotFoundError)
  })

  it('wraps storage errors as retryable unavailability', async () => {
    const failure = fetchTable(failingStorage(new Error('socket hang up')), 'user_1/a.csv', { logger })
    await expect(failure).rejects.toBeInstanceOf(StorageUnavailableError)
    await expect(failure).rejects.toMatchObject({ statusCode: 500, retryable: true })
  })

  it('passes API errors from the adapter through unchanged', async () => {
    const original = new StorageUnavailableError('Storage request timed out')
    await expect(fetchTable(failingStorage(original), 'user_1/a.csv', { logger })).rejects.toBe(original)
  })

  it('raises DecodeFailure for an empty object', async () => {
    const storage = new MemoryStorage()
    storage.put('user_1/empty.csv', '')
    await expect(fetchTable(storage, 'user_1/empty.csv', { detector: null, logger })).rejects.toBeInstanceOf(DecodeFailure)
  })
})

describe('listTenantDatasets', () => {
  it('keeps csv files from the tenant folder', async () => {
    const storage = new MemoryStorage()
    storage.put('user_1/a.csv', 'x\n1\n')
    storage.put('user_1/notes.txt', 'hi')
    storage.put('user_1/nested/b.csv', 'x\n1\n')
    storage.put('user_2/c.csv', 'x\n1\n')
    expect(await listTenantDatasets(storage, '1', logger)).toEqual(['user_1/a.csv'])
  })

  it('reports no datasets when listing fails', async () => {
    expect(await listTenantDatasets(failingStorage(new Error('down')), '1', logger)).toEqual([])
  })
})

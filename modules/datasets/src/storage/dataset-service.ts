import { ApiError, DatasetNotFoundError, StorageUnavailableError, tenantFolder } from '@csvapi/gateway-core'
import type { TenantId } from '@csvapi/gateway-core'
import type { Logger } from '@csvapi/observability'
import { loadTable } from '../loader/encoding-loader'
import type { LoadTableOptions } from '../loader/encoding-loader'
import type { Table } from '../table/table'
import type { ObjectStorage } from './object-storage'

/**
 * Downloads and decodes one dataset. Callers must have authorized `path`
 * for the requesting tenant first.
 */
export async function fetchTable(storage: ObjectStorage, path: string, options: LoadTableOptions = {}): Promise<Table> {
  let bytes: Uint8Array | null
  try {
    bytes = await storage.download(path)
  } catch (error) {
    if (error instanceof ApiError) throw error
    throw new StorageUnavailableError(undefined, { cause: error })
  }
  if (!bytes) throw new DatasetNotFoundError()

  const result = loadTable(bytes, options)
  if (!result.ok) throw result.error
  return result.value
}

/**
 * CSV datasets in a tenant's folder, as full bucket paths. Listing errors
 * are logged and reported as no datasets.
 */
export async function listTenantDatasets(storage: ObjectStorage, tenantId: TenantId, logger: Logger): Promise<string[]> {
  const folder = tenantFolder(tenantId)
  try {
    const names = await storage.list(folder)
    return names.filter((name) => name.endsWith('.csv')).map((name) => `${folder}/${name}`)
  } catch (error) {
    logger.warn({ err: error, tenantId }, '[datasets] Listing failed, reporting no datasets')
    return []
  }
}

/**
 * SupabaseStorage: datasets stored in a Supabase Storage bucket.
 *
 * Request timeouts come from the client's fetch (see createTimeoutFetch);
 * a timed-out call surfaces here as a storage error like any other.
 */

import type { StorageClient } from '@supabase/storage-js'
import { StorageUnavailableError } from '@csvapi/gateway-core'
import type { ObjectStorage } from './object-storage'

export const DEFAULT_BUCKET = 'datasets'

function isNotFound(error: Error): boolean {
  if ('status' in error && (error.status === 404 || error.status === '404')) return true
  return /not found/i.test(error.message)
}

export class SupabaseStorage implements ObjectStorage {
  readonly name = 'supabase'

  private readonly client: StorageClient
  private readonly bucket: string

  constructor(client: StorageClient, bucket = DEFAULT_BUCKET) {
    this.client = client
    this.bucket = bucket
  }

  async download(path: string): Promise<Uint8Array | null> {
    const result = await this.client.from(this.bucket).download(path)
    if (result.error) {
      if (isNotFound(result.error)) return null
      throw new StorageUnavailableError(`Storage download failed: ${result.error.message}`, { cause: result.error })
    }
    return new Uint8Array(await result.data.arrayBuffer())
  }

  async list(folder: string): Promise<string[]> {
    const result = await this.client.from(this.bucket).list(folder)
    if (result.error) {
      throw new StorageUnavailableError(`Storage listing failed: ${result.error.message}`, { cause: result.error })
    }
    return result.data.map((entry) => entry.name)
  }

  async ping(): Promise<void> {
    await this.list('')
  }
}

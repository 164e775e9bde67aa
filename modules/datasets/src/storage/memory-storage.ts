import type { ObjectStorage } from './object-storage'

/** In-process ObjectStorage for tests and local runs. */
export class MemoryStorage implements ObjectStorage {
  readonly name = 'memory'

  private readonly objects = new Map<string, Uint8Array>()

  put(path: string, content: Uint8Array | string): void {
    this.objects.set(path, typeof content === 'string' ? new TextEncoder().encode(content) : content)
  }

  async download(path: string): Promise<Uint8Array | null> {
    return this.objects.get(path) ?? null
  }

  async list(folder: string): Promise<string[]> {
    const prefix = folder ? `${folder.replace(/\/+$/, '')}/` : ''
    const names = new Set<string>()
    for (const path of this.objects.keys()) {
      if (!path.startsWith(prefix)) continue
      names.add(path.slice(prefix.length).split('/')[0])
    }
    return [...names]
  }

  async ping(): Promise<void> {}
}

/**
 * ObjectStorage: the blob store datasets are read from.
 */

export interface ObjectStorage {
  /** Human-readable backend name (e.g. "supabase", "memory"). */
  readonly name: string

  /** Object bytes, or null when nothing is stored at `path`. */
  download(path: string): Promise<Uint8Array | null>

  /** Names of the entries directly under `folder`. */
  list(folder: string): Promise<string[]>

  /** Throws when the backend cannot be reached. */
  ping(): Promise<void>
}

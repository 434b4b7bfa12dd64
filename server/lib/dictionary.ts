import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { FirebaseError } from 'firebase/app'
import { getBytes, listAll, ref, type FirebaseStorage } from 'firebase/storage'
import type { AppConfig } from './config'
import { DictionaryFormatError, DictionaryNotFoundError } from './errors'
import { createFirebaseStorage } from './firebase'
import { DictionaryFileSchema } from './schemas'

export interface DictionaryProvider {
  load(id: string): Promise<readonly string[]>
  list(): Promise<string[]>
}

// plain file names only, so an id can never walk out of the dictionary folder
const DICTIONARY_ID = /^[A-Za-z0-9_-]+\.json$/

export function isDictionaryId(id: string): boolean {
  return DICTIONARY_ID.test(id)
}

export function parseDictionary(id: string, raw: unknown): string[] {
  const result = DictionaryFileSchema.safeParse(raw)
  if (!result.success) throw new DictionaryFormatError(id, 'expected a flat JSON array of strings')
  return result.data
}

export function decodeDictionary(id: string, text: string): string[] {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new DictionaryFormatError(id, 'not valid JSON')
  }
  return parseDictionary(id, raw)
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export class MemoryDictionaryProvider implements DictionaryProvider {
  private readonly dictionaries: Map<string, readonly string[]>

  constructor(dictionaries: Record<string, readonly string[]>) {
    this.dictionaries = new Map(Object.entries(dictionaries))
  }

  async load(id: string): Promise<readonly string[]> {
    const words = this.dictionaries.get(id)
    if (!words) throw new DictionaryNotFoundError(id)
    return words
  }

  async list(): Promise<string[]> {
    return [...this.dictionaries.keys()].sort()
  }
}

/**
 * Reads dictionaries from JSON files in a local folder.
 */
export class FileDictionaryProvider implements DictionaryProvider {
  constructor(private readonly dir: string) {}

  async load(id: string): Promise<string[]> {
    if (!isDictionaryId(id)) throw new DictionaryNotFoundError(id)
    let text: string
    try {
      text = await readFile(join(this.dir, id), 'utf-8')
    } catch (err) {
      if (isMissingFile(err)) throw new DictionaryNotFoundError(id)
      throw err
    }
    return decodeDictionary(id, text)
  }

  async list(): Promise<string[]> {
    const files = await readdir(this.dir)
    return files.filter(isDictionaryId).sort()
  }
}

/**
 * Reads dictionaries from `<folder>/<id>` in a Cloud Storage bucket.
 */
export class FirebaseStorageDictionaryProvider implements DictionaryProvider {
  constructor(
    private readonly storage: FirebaseStorage,
    private readonly folder = 'dictionaries',
  ) {}

  async load(id: string): Promise<string[]> {
    if (!isDictionaryId(id)) throw new DictionaryNotFoundError(id)
    let bytes: ArrayBuffer
    try {
      bytes = await getBytes(ref(this.storage, `${this.folder}/${id}`))
    } catch (err) {
      if (err instanceof FirebaseError && err.code === 'storage/object-not-found') {
        throw new DictionaryNotFoundError(id)
      }
      throw err
    }
    return decodeDictionary(id, new TextDecoder().decode(bytes))
  }

  async list(): Promise<string[]> {
    const result = await listAll(ref(this.storage, this.folder))
    return result.items.map(item => item.name).filter(isDictionaryId).sort()
  }
}

/**
 * Read-through cache in front of another provider. Words are trimmed, lower-cased and frozen on
 * first load, so every caller shares one immutable array per id. Concurrent misses for the same id
 * share one load.
 */
export class CachedDictionaryProvider implements DictionaryProvider {
  private readonly words = new Map<string, readonly string[]>()
  private readonly pending = new Map<string, Promise<readonly string[]>>()

  constructor(private readonly inner: DictionaryProvider) {}

  async load(id: string): Promise<readonly string[]> {
    const cached = this.words.get(id)
    if (cached) return cached
    let inflight = this.pending.get(id)
    if (!inflight) {
      inflight = this.populate(id)
      this.pending.set(id, inflight)
    }
    return inflight
  }

  list(): Promise<string[]> {
    return this.inner.list()
  }

  private async populate(id: string): Promise<readonly string[]> {
    try {
      const raw = await this.inner.load(id)
      const words = Object.freeze(raw.map(w => w.trim().toLowerCase()).filter(w => w.length > 0))
      this.words.set(id, words)
      console.log(`[dictionary] loaded ${id} (${words.length} words)`)
      return words
    } finally {
      this.pending.delete(id)
    }
  }
}

export function createDictionaryProvider(config: AppConfig): DictionaryProvider {
  const source: DictionaryProvider =
    config.dictionarySource === 'firebase'
      ? new FirebaseStorageDictionaryProvider(createFirebaseStorage(config.firebase))
      : new FileDictionaryProvider(config.dictionaryDir)
  return new CachedDictionaryProvider(source)
}

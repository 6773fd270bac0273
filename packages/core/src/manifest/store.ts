import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { expandHomePath } from '../config/paths.js'
import { LocalIoError } from '../errors/catalog.js'
import { assertEntryFields, parseManifest, serializeManifest } from './format.js'
import type { Manifest, ManifestEntry, ManifestStore } from './types.js'

/** Current UTC time without milliseconds, e.g. "2026-01-21T10:00:00Z". */
export function registrationTimestamp(now: Date = new Date()): string {
  const copy = new Date(now)
  copy.setMilliseconds(0)
  return copy.toISOString().replace('.000Z', 'Z')
}

/** A read-only manifest over a fixed list, e.g. one downloaded from the remote. */
export function createManifest(entries: ManifestEntry[]): Manifest {
  return {
    list: () => entries.map((entry) => ({ ...entry })),
    resolve: expandHomePath,
  }
}

/**
 * Load the manifest at `path` into memory. A missing file gives an empty
 * store; the file (with its header) is created on the first flush.
 * Changes stay in memory until `flush()`.
 */
export async function openManifestStore(path: string): Promise<ManifestStore> {
  let raw: string | undefined
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw new LocalIoError(path, err)
    }
  }

  const entries = raw !== undefined ? parseManifest(raw) : []
  let dirty = raw === undefined

  return {
    path,

    get dirty() {
      return dirty
    },

    list() {
      return entries.map((entry) => ({ ...entry }))
    },

    resolve: expandHomePath,

    register(remoteName, localPath, registeredAt = registrationTimestamp()) {
      assertEntryFields(remoteName, localPath)
      const entry: ManifestEntry = { remoteName, localPath, registeredAt }
      entries.push(entry)
      dirty = true
      return { ...entry }
    },

    deregister(remoteName) {
      const index = entries.findIndex((entry) => entry.remoteName === remoteName)
      if (index === -1) return null
      const [removed] = entries.splice(index, 1)
      dirty = true
      return removed ?? null
    },

    async flush() {
      if (!dirty) return
      try {
        await mkdir(dirname(path), { recursive: true })
        await writeFile(path, serializeManifest(entries), 'utf-8')
      } catch (err: unknown) {
        throw new LocalIoError(path, err)
      }
      dirty = false
    },
  }
}

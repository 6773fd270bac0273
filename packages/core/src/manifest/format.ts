import { InvalidEntryError, ManifestParseError } from '../errors/catalog.js'
import type { ManifestEntry } from './types.js'

export const MANIFEST_HEADER = '[FILES]'
export const ENTRY_ARROW = '->'

const WHITESPACE = /\s/

/**
 * Parse manifest text. The first line is the header and is never read as an
 * entry; blank lines are skipped. Each entry line is
 * `<remoteName> -> <localPath> - <timestamp>`, split on whitespace.
 */
export function parseManifest(text: string): ManifestEntry[] {
  const lines = text.split(/\r?\n/)
  const entries: ManifestEntry[] = []

  lines.slice(1).forEach((line, index) => {
    const fields = line.trim().split(/\s+/)
    if (fields[0] === '') return

    const [remoteName, , localPath, , registeredAt] = fields
    if (remoteName === undefined || localPath === undefined) {
      throw new ManifestParseError(index + 2, line)
    }

    entries.push({
      remoteName,
      localPath,
      ...(registeredAt !== undefined && { registeredAt }),
    })
  })

  return entries
}

export function formatEntry(entry: ManifestEntry): string {
  return `${entry.remoteName} ${ENTRY_ARROW} ${entry.localPath} - ${entry.registeredAt ?? ''}`.trimEnd()
}

export function serializeManifest(entries: ManifestEntry[]): string {
  return [MANIFEST_HEADER, ...entries.map(formatEntry)].join('\n') + '\n'
}

/** Both fields end up as single whitespace-separated tokens on disk. */
export function assertEntryFields(remoteName: string, localPath: string): void {
  if (remoteName === '' || WHITESPACE.test(remoteName)) {
    throw new InvalidEntryError('remoteName', remoteName)
  }
  if (localPath === '' || WHITESPACE.test(localPath)) {
    throw new InvalidEntryError('localPath', localPath)
  }
}

export interface ManifestEntry {
  remoteName: string // path inside the repository
  localPath: string // as registered; may start with "~"
  registeredAt?: string // ISO 8601
}

/** Read side of a manifest, enough to drive a sync. */
export interface Manifest {
  list(): ManifestEntry[]
  resolve(localPath: string): string
}

export interface ManifestStore extends Manifest {
  readonly path: string
  /** True when the in-memory entries differ from the file. */
  readonly dirty: boolean
  register(remoteName: string, localPath: string, registeredAt?: string): ManifestEntry
  /** Removes the first entry named `remoteName`; null when there is none. */
  deregister(remoteName: string): ManifestEntry | null
  flush(): Promise<void>
}

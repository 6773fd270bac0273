export type { ManifestEntry, Manifest, ManifestStore } from './types.js'
export {
  MANIFEST_HEADER,
  parseManifest,
  serializeManifest,
  formatEntry,
} from './format.js'
export { openManifestStore, createManifest, registrationTimestamp } from './store.js'

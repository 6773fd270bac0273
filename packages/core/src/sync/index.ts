export type {
  SyncDeps,
  LocalIoDeps,
  RemoteFileState,
  DownloadedFile,
  LocalFile,
  UploadOptions,
  UploadResult,
} from "./types.js";
export {
  fetchFile,
  downloadAll,
  fetchRemoteManifest,
  REMOTE_MANIFEST_PATH,
} from "./workers/download.js";
export { readLocal, writeLocal } from "./workers/local-files.js";
export {
  uploadAll,
  bootstrapBranch,
  INITIAL_COMMIT_MESSAGE,
} from "./workers/upload.js";
export { checkRepository } from "./workers/repository.js";
export {
  createMirror,
  manifestFile,
  type Mirror,
  type MirrorOptions,
  type DownloadOptions,
} from "./engine/mirror.js";

import type { Logger } from "pino";
import type { GitHubClient } from "../../github/client.js";
import type { Manifest } from "../../manifest/types.js";
import type {
  DownloadedFile,
  LocalFile,
  SyncDeps,
  UploadOptions,
  UploadResult,
} from "../types.js";
import { serializeManifest } from "../../manifest/format.js";
import { REMOTE_MANIFEST_PATH, downloadAll, fetchRemoteManifest } from "../workers/download.js";
import { readLocal, writeLocal } from "../workers/local-files.js";
import { uploadAll } from "../workers/upload.js";

export interface MirrorOptions {
  client: GitHubClient;
  branch: string;
  logger: Logger;
  manifest: Manifest;
}

export interface DownloadOptions {
  /** Take the file list from the manifest stored in the repository. */
  remoteManifest?: boolean;
}

/**
 * The manifest as a file to publish beside the registered files, so another
 * machine can download with `remoteManifest`.
 */
export function manifestFile(manifest: Manifest): LocalFile {
  return {
    remoteName: REMOTE_MANIFEST_PATH,
    localPath: REMOTE_MANIFEST_PATH,
    content: Buffer.from(serializeManifest(manifest.list()), "utf-8"),
  };
}

export interface Mirror {
  /** Read every registered file and publish them, with the manifest, as one commit. */
  upload(options?: UploadOptions): Promise<UploadResult>;

  /** Fetch every registered file and overwrite its local copy. */
  download(options?: DownloadOptions): Promise<DownloadedFile[]>;
}

export function createMirror(options: MirrorOptions): Mirror {
  const { manifest, logger } = options;
  const deps: SyncDeps = {
    client: options.client,
    branch: options.branch,
    logger,
  };

  return {
    async upload(uploadOptions) {
      const files = await readLocal(deps, manifest);
      return uploadAll(deps, [...files, manifestFile(manifest)], uploadOptions);
    },

    async download(downloadOptions) {
      const source = downloadOptions?.remoteManifest
        ? await fetchRemoteManifest(deps)
        : manifest;
      // Fetch everything before touching the disk
      const files = await downloadAll(deps, source);
      await writeLocal(deps, files);
      return files;
    },
  };
}

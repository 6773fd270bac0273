import type { Logger } from "pino";
import type { GitHubClient } from "../github/client.js";

/** Everything a sync worker needs to talk to one branch. */
export interface SyncDeps {
  client: GitHubClient;
  branch: string;
  logger: Logger;
}

export interface LocalIoDeps {
  logger: Logger;
}

/** A file as it currently exists on the remote branch. */
export interface RemoteFileState {
  path: string;
  sha: string; // blob sha
  content: Uint8Array;
}

/** A remote file paired with the local path it belongs at. */
export interface DownloadedFile {
  remoteName: string;
  localPath: string; // resolved, absolute or cwd-relative
  sha: string;
  content: Uint8Array;
}

/** A registered local file read from disk, ready to upload. */
export interface LocalFile {
  remoteName: string;
  localPath: string; // resolved
  content: Uint8Array;
}

export interface UploadOptions {
  message?: string;
  /** Remote names to delete from the branch in the same commit. */
  remove?: string[];
}

export interface UploadResult {
  commitSha: string;
  treeSha: string;
  parentSha: string;
  /** True when the branch had to be created first. */
  bootstrapped: boolean;
  files: Array<{ remoteName: string; sha: string }>;
  removed: string[];
}

import type { Manifest } from "../../manifest/types.js";
import type { DownloadedFile, RemoteFileState, SyncDeps } from "../types.js";
import { NotAFileError } from "../../errors/catalog.js";
import { createManifest } from "../../manifest/store.js";
import { parseManifest } from "../../manifest/format.js";

/** Where the placeholder manifest lives in the repository. */
export const REMOTE_MANIFEST_PATH = ".master";

/**
 * Fetch one file from the branch and decode it:
 * 1. Ask the contents endpoint for `path` at the branch
 * 2. Reject directory listings and non-file entries
 * 3. Decode the inline base64 body, or read the blob by sha when the
 *    endpoint left it out (files over the inline size limit)
 */
export async function fetchFile(
  deps: SyncDeps,
  path: string,
): Promise<RemoteFileState> {
  const { client, branch, logger } = deps;

  const res = await client.getContents(path, branch);

  if (Array.isArray(res)) {
    throw new NotAFileError(path, { entries: res.length });
  }
  if (res.type !== "file") {
    throw new NotAFileError(path, { type: res.type });
  }

  if ("content" in res && res.encoding === "base64") {
    return { path, sha: res.sha, content: Buffer.from(res.content, "base64") };
  }

  logger.debug({ path, sha: res.sha }, "Contents not inlined, reading blob");
  const blob = await client.getBlob(res.sha);
  const encoding = blob.encoding === "base64" ? "base64" : "utf-8";
  return { path, sha: res.sha, content: Buffer.from(blob.content, encoding) };
}

/**
 * Fetch every registered file, in manifest order. The first failure aborts
 * the batch; nothing is written locally here.
 */
export async function downloadAll(
  deps: SyncDeps,
  manifest: Manifest,
): Promise<DownloadedFile[]> {
  const results: DownloadedFile[] = [];

  for (const entry of manifest.list()) {
    const remote = await fetchFile(deps, entry.remoteName);
    results.push({
      remoteName: entry.remoteName,
      localPath: manifest.resolve(entry.localPath),
      sha: remote.sha,
      content: remote.content,
    });
    deps.logger.info(
      { remoteName: entry.remoteName, sha: remote.sha, bytes: remote.content.length },
      "Downloaded file",
    );
  }

  return results;
}

/** Read and parse a manifest that is stored in the repository itself. */
export async function fetchRemoteManifest(
  deps: SyncDeps,
  path: string = REMOTE_MANIFEST_PATH,
): Promise<Manifest> {
  const file = await fetchFile(deps, path);
  const entries = parseManifest(Buffer.from(file.content).toString("utf-8"));
  deps.logger.info({ path, entries: entries.length }, "Loaded remote manifest");
  return createManifest(entries);
}

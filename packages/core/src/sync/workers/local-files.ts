import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Manifest } from "../../manifest/types.js";
import type { DownloadedFile, LocalFile, LocalIoDeps } from "../types.js";
import { LocalIoError } from "../../errors/catalog.js";

/** Read every registered local file as bytes, in manifest order. */
export async function readLocal(
  deps: LocalIoDeps,
  manifest: Manifest,
): Promise<LocalFile[]> {
  const files: LocalFile[] = [];

  for (const entry of manifest.list()) {
    const localPath = manifest.resolve(entry.localPath);
    let content: Buffer;
    try {
      content = await readFile(localPath);
    } catch (err: unknown) {
      throw new LocalIoError(localPath, err);
    }
    files.push({ remoteName: entry.remoteName, localPath, content });
    deps.logger.debug({ remoteName: entry.remoteName, localPath }, "Read local file");
  }

  return files;
}

/**
 * Overwrite each local path with its downloaded content, creating missing
 * parent directories. Previous content is not kept.
 */
export async function writeLocal(
  deps: LocalIoDeps,
  files: DownloadedFile[],
): Promise<void> {
  for (const file of files) {
    try {
      await mkdir(dirname(file.localPath), { recursive: true });
      await writeFile(file.localPath, file.content);
    } catch (err: unknown) {
      throw new LocalIoError(file.localPath, err);
    }
    deps.logger.info(
      { remoteName: file.remoteName, localPath: file.localPath },
      "Wrote local file",
    );
  }
}

import type { BranchHead, TreeEntryInput } from "../../github/types.js";
import type { LocalFile, SyncDeps, UploadOptions, UploadResult } from "../types.js";
import { EMPTY_TREE_SHA, FileMode } from "../../github/types.js";
import { DEFAULTS } from "../../schemas/mirror-config.js";
import { REMOTE_MANIFEST_PATH } from "./download.js";

export const INITIAL_COMMIT_MESSAGE = "Initial Commit";

/**
 * Give the branch a head commit when it has none. Returns the head sha.
 *
 * A repository with no commits refuses every git data write, so the
 * placeholder file goes through the contents endpoint first. That creates
 * the branch; the reference is then forced onto a parentless commit of the
 * empty tree, which does not descend from the placeholder commit.
 *
 * A repository that has commits but not this branch only needs the root
 * commit and a new reference.
 */
export async function bootstrapBranch(
  deps: SyncDeps,
  head?: BranchHead,
): Promise<string> {
  const { client, branch, logger } = deps;
  const state = head ?? (await client.getBranchHead(branch));

  if (state.state === "exists") {
    return state.ref.object.sha;
  }

  if (state.state === "empty-repository") {
    logger.info({ branch }, "Repository has no commits, creating placeholder");
    await client.putContents(REMOTE_MANIFEST_PATH, {
      message: INITIAL_COMMIT_MESSAGE,
      content: "",
      branch,
    });
  }

  const root = await client.createCommit({
    message: INITIAL_COMMIT_MESSAGE,
    tree: EMPTY_TREE_SHA,
    parents: [],
  });

  if (state.state === "empty-repository") {
    await client.updateBranchRef(branch, { sha: root.sha, force: true });
  } else {
    await client.createBranchRef(branch, root.sha);
  }

  logger.info({ branch, sha: root.sha }, "Bootstrapped branch");
  return root.sha;
}

/**
 * Publish local files as one new commit on the branch:
 * 1. Read the branch head, bootstrapping the branch when it has none
 * 2. Create a blob per file
 * 3. Build a tree on top of the head commit's tree
 * 4. Commit with the head as the only parent
 * 5. Fast-forward the branch reference
 *
 * The reference is untouched until step 5, so a failure earlier leaves
 * the branch where it was (orphaned blobs and trees are harmless).
 */
export async function uploadAll(
  deps: SyncDeps,
  files: LocalFile[],
  options?: UploadOptions,
): Promise<UploadResult> {
  const { client, branch, logger } = deps;
  const message = options?.message ?? DEFAULTS.commit.message;

  const head = await client.getBranchHead(branch);
  const bootstrapped = head.state !== "exists";
  const parentSha = await bootstrapBranch(deps, head);

  // Later registrations of the same remote name win
  const byName = new Map<string, LocalFile>();
  for (const file of files) {
    byName.set(file.remoteName, file);
  }

  const entries: TreeEntryInput[] = [];
  const uploaded: UploadResult["files"] = [];

  for (const file of byName.values()) {
    const blob = await client.createBlob(file.content);
    entries.push({
      path: file.remoteName,
      mode: FileMode.file,
      type: "blob",
      sha: blob.sha,
    });
    uploaded.push({ remoteName: file.remoteName, sha: blob.sha });
    logger.debug({ remoteName: file.remoteName, sha: blob.sha }, "Created blob");
  }

  const removed = (options?.remove ?? []).filter((name) => !byName.has(name));
  for (const name of removed) {
    entries.push({ path: name, mode: FileMode.file, type: "blob", sha: null });
  }

  const parent = await client.getCommit(parentSha);
  const tree = await client.createTree({
    base_tree: parent.tree.sha,
    tree: entries,
  });
  const commit = await client.createCommit({
    message,
    tree: tree.sha,
    parents: [parentSha],
  });
  await client.updateBranchRef(branch, { sha: commit.sha });

  logger.info(
    {
      branch,
      commit: commit.sha,
      files: uploaded.length,
      removed: removed.length,
    },
    "Uploaded files",
  );

  return {
    commitSha: commit.sha,
    treeSha: tree.sha,
    parentSha,
    bootstrapped,
    files: uploaded,
    removed,
  };
}

/**
 * Request and response shapes for the GitHub REST endpoints the mirror uses
 * (git data API, contents API, repositories, rate limit).
 *
 * Responses are validated with zod and unknown fields are stripped, so the
 * inferred types only carry what the sync code reads.
 */

import { z } from "zod";

/** Git file modes accepted in tree entries. */
export const FileMode = {
  file: "100644",
  executable: "100755",
  directory: "040000",
  submodule: "160000",
  symlink: "120000",
} as const;
export type FileMode = (typeof FileMode)[keyof typeof FileMode];

/** Git's well-known hash of the tree with no entries. */
export const EMPTY_TREE_SHA = "4b825dc642cb6eb9a060e54bf8d69288fbee4904";

export const TreeEntryType = z.enum(["blob", "tree", "commit"]);

// --- References ---

export const GitRefSchema = z.object({
  ref: z.string(),
  object: z.object({
    sha: z.string(),
    type: z.string(),
  }),
});
export type GitRef = z.infer<typeof GitRefSchema>;

/**
 * What the reference endpoint says about a branch. GitHub answers 409 for a
 * repository with no commits and 404 for a branch that does not exist.
 */
export type BranchHead =
  | { state: "exists"; ref: GitRef }
  | { state: "missing" }
  | { state: "empty-repository" };

export interface CreateRefRequest {
  /** Fully qualified, e.g. "refs/heads/main". */
  ref: string;
  sha: string;
}

export interface UpdateRefRequest {
  sha: string;
  force?: boolean;
}

// --- Commits ---

export const GitCommitSchema = z.object({
  sha: z.string(),
  message: z.string(),
  tree: z.object({ sha: z.string() }),
  parents: z.array(z.object({ sha: z.string() })),
});
export type GitCommit = z.infer<typeof GitCommitSchema>;

export interface CreateCommitRequest {
  message: string;
  tree: string;
  /** Empty for a root commit. */
  parents: string[];
}

// --- Trees ---

export const TreeEntrySchema = z.object({
  path: z.string(),
  mode: z.string(),
  type: TreeEntryType,
  sha: z.string(),
  size: z.number().optional(),
});
export type TreeEntry = z.infer<typeof TreeEntrySchema>;

export const GitTreeSchema = z.object({
  sha: z.string(),
  tree: z.array(TreeEntrySchema),
  truncated: z.boolean().optional(),
});
export type GitTree = z.infer<typeof GitTreeSchema>;

export interface TreeEntryInput {
  path: string;
  mode: FileMode;
  type: z.infer<typeof TreeEntryType>;
  /** null removes `path` from the base tree. */
  sha: string | null;
}

export interface CreateTreeRequest {
  base_tree?: string;
  tree: TreeEntryInput[];
}

// --- Blobs ---

export interface CreateBlobRequest {
  content: string;
  encoding: "base64" | "utf-8";
}

export const GitBlobRefSchema = z.object({
  sha: z.string(),
});
export type GitBlobRef = z.infer<typeof GitBlobRefSchema>;

export const GitBlobSchema = z.object({
  sha: z.string(),
  content: z.string(),
  encoding: z.string(),
  size: z.number(),
});
export type GitBlob = z.infer<typeof GitBlobSchema>;

// --- Contents ---

export const ContentEntrySchema = z.object({
  type: z.enum(["file", "dir", "symlink", "submodule"]),
  name: z.string(),
  path: z.string(),
  sha: z.string(),
  size: z.number(),
});
export type ContentEntry = z.infer<typeof ContentEntrySchema>;

/** Single-file response; `encoding` is "none" when the file is too large to inline. */
export const ContentFileSchema = ContentEntrySchema.extend({
  type: z.literal("file"),
  encoding: z.string(),
  content: z.string(),
});
export type ContentFile = z.infer<typeof ContentFileSchema>;

/** Directories answer with an array of entries. */
export const ContentsResponseSchema = z.union([
  z.array(ContentEntrySchema),
  ContentFileSchema,
  ContentEntrySchema,
]);
export type ContentsResponse = z.infer<typeof ContentsResponseSchema>;

export interface PutContentsRequest {
  message: string;
  /** base64 */
  content: string;
  branch?: string;
  /** Blob sha of the file being replaced. */
  sha?: string;
}

export const PutContentsResponseSchema = z.object({
  content: z.object({ sha: z.string(), path: z.string() }).nullable(),
  commit: z.object({ sha: z.string() }),
});
export type PutContentsResponse = z.infer<typeof PutContentsResponseSchema>;

// --- Repositories ---

export const RepositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  private: z.boolean(),
  default_branch: z.string().optional(),
  owner: z.object({ login: z.string() }),
});
export type Repository = z.infer<typeof RepositorySchema>;

export interface CreateRepositoryRequest {
  name: string;
  description?: string;
  private?: boolean;
  auto_init?: boolean;
}

// --- Rate limit ---

const RateSchema = z.object({
  limit: z.number(),
  remaining: z.number(),
  reset: z.number(),
  used: z.number(),
});

export const RateLimitSchema = z.object({
  resources: z.object({ core: RateSchema }),
  rate: RateSchema,
});
export type RateLimit = z.infer<typeof RateLimitSchema>;

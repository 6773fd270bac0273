export {
  DEFAULT_API_URL,
  createGitHubClient,
  createRemoteRepository,
  encodePath,
  type ApiOptions,
  type FetchLike,
  type GitHubClient,
  type GitHubClientOptions,
} from "./client.js";
export {
  EMPTY_TREE_SHA,
  FileMode,
  type BranchHead,
  type ContentEntry,
  type ContentFile,
  type ContentsResponse,
  type CreateBlobRequest,
  type CreateCommitRequest,
  type CreateRefRequest,
  type CreateRepositoryRequest,
  type CreateTreeRequest,
  type GitBlob,
  type GitBlobRef,
  type GitCommit,
  type GitRef,
  type GitTree,
  type PutContentsRequest,
  type PutContentsResponse,
  type RateLimit,
  type Repository,
  type TreeEntry,
  type TreeEntryInput,
  type UpdateRefRequest,
} from "./types.js";

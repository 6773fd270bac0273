/**
 * GitHub REST client for the endpoints the mirror needs: the git data API
 * (refs, commits, trees, blobs), the contents API, repositories and the
 * rate-limit lookup.
 *
 * Every non-2xx answer becomes a typed error carrying the status and the
 * response body. Nothing is retried.
 */

import type { z } from "zod";
import {
  AuthError,
  NotFoundError,
  RemoteApiError,
} from "../errors/catalog.js";
import {
  ContentsResponseSchema,
  GitBlobRefSchema,
  GitBlobSchema,
  GitCommitSchema,
  GitRefSchema,
  GitTreeSchema,
  PutContentsResponseSchema,
  RateLimitSchema,
  RepositorySchema,
  type BranchHead,
  type ContentsResponse,
  type CreateBlobRequest,
  type CreateRefRequest,
  type CreateCommitRequest,
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
  type UpdateRefRequest,
} from "./types.js";

export const DEFAULT_API_URL = "https://api.github.com";

/** Subset of `fetch` the client calls; tests pass an in-process handler. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface ApiOptions {
  apiUrl?: string;
  token: string;
  fetch?: FetchLike;
}

export interface GitHubClientOptions extends ApiOptions {
  owner: string;
  repo: string;
}

export interface GitHubClient {
  readonly owner: string;
  readonly repo: string;

  getRepository(): Promise<Repository>;

  getBranchHead(branch: string): Promise<BranchHead>;
  createBranchRef(branch: string, sha: string): Promise<GitRef>;
  updateBranchRef(branch: string, request: UpdateRefRequest): Promise<GitRef>;

  getCommit(sha: string): Promise<GitCommit>;
  createCommit(request: CreateCommitRequest): Promise<GitCommit>;

  getTree(sha: string): Promise<GitTree>;
  createTree(request: CreateTreeRequest): Promise<GitTree>;

  createBlob(content: Uint8Array): Promise<GitBlobRef>;
  getBlob(sha: string): Promise<GitBlob>;

  getContents(path: string, ref?: string): Promise<ContentsResponse>;
  putContents(path: string, request: PutContentsRequest): Promise<PutContentsResponse>;

  /** Available for callers; the sync code never consults it. */
  getRateLimit(): Promise<RateLimit>;
}

type Method = "GET" | "POST" | "PUT" | "PATCH";

/** "dir/my file.txt" → "dir/my%20file.txt" */
export function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

function createTransport(options: ApiOptions) {
  const base = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
  const doFetch: FetchLike =
    options.fetch ?? ((url, init) => fetch(url, init));

  async function failure(res: Response, resource: string): Promise<Error> {
    const body = await res.text().catch(() => "");
    if (res.status === 401 || res.status === 403) {
      return new AuthError(res.status, { resource, body });
    }
    if (res.status === 404) {
      return new NotFoundError(resource, { body });
    }
    return new RemoteApiError(res.status, body, { resource });
  }

  // 2xx with a body that is not the expected JSON
  async function parse<S extends z.ZodType>(
    schema: S,
    res: Response,
    resource: string,
  ): Promise<z.infer<S>> {
    const text = await res.text();
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (err: unknown) {
      throw new RemoteApiError(res.status, text, { resource, cause: String(err) });
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RemoteApiError(res.status, text, {
        resource,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }

  async function send(
    method: Method,
    path: string,
    body?: unknown,
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      Authorization: `token ${options.token}`,
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    return doFetch(`${base}${path}`, {
      method,
      headers,
      ...(body !== undefined && { body: JSON.stringify(body) }),
    });
  }

  async function request<S extends z.ZodType>(
    schema: S,
    method: Method,
    path: string,
    body?: unknown,
  ): Promise<z.infer<S>> {
    const res = await send(method, path, body);
    if (!res.ok) {
      throw await failure(res, path);
    }
    return parse(schema, res, path);
  }

  return { send, request, parse, failure };
}

export function createGitHubClient(options: GitHubClientOptions): GitHubClient {
  const { owner, repo } = options;
  const { send, request, parse, failure } = createTransport(options);
  const repoPath = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;

  return {
    owner,
    repo,

    async getRepository() {
      return request(RepositorySchema, "GET", repoPath);
    },

    async getBranchHead(branch) {
      const path = `${repoPath}/git/ref/heads/${encodePath(branch)}`;
      const res = await send("GET", path);
      if (res.status === 409) return { state: "empty-repository" };
      if (res.status === 404) return { state: "missing" };
      if (!res.ok) {
        throw await failure(res, path);
      }
      return { state: "exists", ref: await parse(GitRefSchema, res, path) };
    },

    async createBranchRef(branch, sha) {
      const body: CreateRefRequest = { ref: `refs/heads/${branch}`, sha };
      return request(GitRefSchema, "POST", `${repoPath}/git/refs`, body);
    },

    async updateBranchRef(branch, body) {
      return request(
        GitRefSchema,
        "PATCH",
        `${repoPath}/git/refs/heads/${encodePath(branch)}`,
        body,
      );
    },

    async getCommit(sha) {
      return request(GitCommitSchema, "GET", `${repoPath}/git/commits/${sha}`);
    },

    async createCommit(body) {
      return request(GitCommitSchema, "POST", `${repoPath}/git/commits`, body);
    },

    async getTree(sha) {
      return request(GitTreeSchema, "GET", `${repoPath}/git/trees/${sha}`);
    },

    async createTree(body) {
      return request(GitTreeSchema, "POST", `${repoPath}/git/trees`, body);
    },

    async createBlob(content) {
      const body: CreateBlobRequest = {
        content: Buffer.from(content).toString("base64"),
        encoding: "base64",
      };
      return request(GitBlobRefSchema, "POST", `${repoPath}/git/blobs`, body);
    },

    async getBlob(sha) {
      return request(GitBlobSchema, "GET", `${repoPath}/git/blobs/${sha}`);
    },

    async getContents(path, ref) {
      const query = ref !== undefined ? `?ref=${encodeURIComponent(ref)}` : "";
      return request(
        ContentsResponseSchema,
        "GET",
        `${repoPath}/contents/${encodePath(path)}${query}`,
      );
    },

    async putContents(path, body) {
      return request(
        PutContentsResponseSchema,
        "PUT",
        `${repoPath}/contents/${encodePath(path)}`,
        body,
      );
    },

    async getRateLimit() {
      return request(RateLimitSchema, "GET", "/rate_limit");
    },
  };
}

/**
 * Create a repository owned by the authenticated user. `auto_init` gives it
 * an initial commit on the default branch.
 */
export async function createRemoteRepository(
  options: ApiOptions,
  body: CreateRepositoryRequest,
): Promise<Repository> {
  const { request } = createTransport(options);
  return request(RepositorySchema, "POST", "/user/repos", {
    auto_init: true,
    ...body,
  });
}

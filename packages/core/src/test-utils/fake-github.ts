/**
 * In-process stand-in for the GitHub REST API, built on Hono and served
 * through `app.request`, so tests never open a socket.
 *
 * Models one repository with content-addressed blobs, flat trees (full
 * paths), commits and branch refs, plus the quirks the mirror depends on:
 * git data writes answer 409 while the repository has no commits, the
 * contents API is the only way to create the first commit, and ref updates
 * must fast-forward unless forced.
 */

import { createHash } from "node:crypto";
import { Hono, type Context } from "hono";
import { z } from "zod";
import type { FetchLike } from "../github/client.js";
import { EMPTY_TREE_SHA } from "../github/types.js";

interface FakeTreeEntry {
  mode: string;
  sha: string;
}

type FakeTree = Map<string, FakeTreeEntry>;

export interface FakeCommit {
  sha: string;
  message: string;
  tree: string;
  parents: string[];
}

interface PlannedFailure {
  method: string;
  pathSuffix: string;
  status: number;
  body: unknown;
}

export interface FakeGitHubOptions {
  owner?: string;
  repo?: string;
  token?: string;
  defaultBranch?: string;
  /** false: every repository route answers 404 until POST /user/repos. */
  exists?: boolean;
  /** Files larger than this are returned with `encoding: "none"`. */
  inlineLimit?: number;
}

export interface FakeGitHub {
  readonly app: Hono;
  readonly fetch: FetchLike;
  readonly apiUrl: string;
  readonly owner: string;
  readonly repo: string;
  readonly token: string;
  /** "METHOD /path" for every request received, in order. */
  readonly requests: string[];
  headOf(branch: string): string | undefined;
  /** First-parent chain from the branch head back to the root commit. */
  history(branch: string): FakeCommit[];
  readFile(branch: string, path: string): Buffer | undefined;
  listFiles(branch: string): string[];
  /** Commit a file directly, bypassing the API. */
  seedFile(branch: string, path: string, content: string | Uint8Array): string;
  /** Answer the next matching request with `status` instead of handling it. */
  failNext(method: string, pathSuffix: string, status: number, body?: unknown): void;
}

const TreeInputSchema = z.object({
  base_tree: z.string().optional(),
  tree: z.array(
    z.object({
      path: z.string().min(1),
      mode: z.string(),
      type: z.enum(["blob", "tree", "commit"]),
      sha: z.string().nullable(),
    }),
  ),
});

const BlobInputSchema = z.object({
  content: z.string(),
  encoding: z.enum(["base64", "utf-8"]).default("utf-8"),
});

const CommitInputSchema = z.object({
  message: z.string(),
  tree: z.string(),
  parents: z.array(z.string()).default([]),
});

const RefCreateSchema = z.object({ ref: z.string(), sha: z.string() });
const RefUpdateSchema = z.object({ sha: z.string(), force: z.boolean().optional() });

const ContentsPutSchema = z.object({
  message: z.string(),
  content: z.string(),
  branch: z.string().optional(),
  sha: z.string().optional(),
});

const RepoCreateSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  private: z.boolean().optional(),
  auto_init: z.boolean().optional(),
});

function sha1(text: string | Uint8Array): string {
  return createHash("sha1").update(text).digest("hex");
}

function blobSha(content: Uint8Array): string {
  return sha1(Buffer.concat([Buffer.from(`blob ${content.length}\0`), content]));
}

function treeSha(tree: FakeTree): string {
  if (tree.size === 0) return EMPTY_TREE_SHA;
  const lines = [...tree.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([path, entry]) => `${entry.mode} ${path} ${entry.sha}`);
  return sha1(`tree\n${lines.join("\n")}`);
}

/** base64 wrapped at 60 columns, the way the contents API returns it. */
function wrappedBase64(content: Uint8Array): string {
  const encoded = Buffer.from(content).toString("base64");
  return (encoded.match(/.{1,60}/g) ?? []).join("\n") + "\n";
}

function json(body: unknown, status: number): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function tailAfter(c: Context, marker: string): string {
  const path = c.req.path;
  const index = path.indexOf(marker);
  return decodeURIComponent(path.slice(index + marker.length));
}

export function createFakeGitHub(options?: FakeGitHubOptions): FakeGitHub {
  const owner = options?.owner ?? "octo-cat";
  const repo = options?.repo ?? "dotfiles";
  const token = options?.token ?? "test-token";
  const defaultBranch = options?.defaultBranch ?? "main";
  const inlineLimit = options?.inlineLimit ?? Number.POSITIVE_INFINITY;
  const apiUrl = "https://api.github.test";

  let exists = options?.exists ?? true;
  let commitCounter = 0;
  const blobs = new Map<string, Buffer>();
  const trees = new Map<string, FakeTree>([[EMPTY_TREE_SHA, new Map()]]);
  const commits = new Map<string, FakeCommit>();
  const refs = new Map<string, string>();
  const requests: string[] = [];
  const failures: PlannedFailure[] = [];

  function isEmpty(): boolean {
    return refs.size === 0;
  }

  function storeBlob(content: Uint8Array): string {
    const sha = blobSha(content);
    blobs.set(sha, Buffer.from(content));
    return sha;
  }

  function storeTree(tree: FakeTree): string {
    const sha = treeSha(tree);
    trees.set(sha, tree);
    return sha;
  }

  function storeCommit(message: string, tree: string, parents: string[]): FakeCommit {
    commitCounter += 1;
    const sha = sha1(`commit\n${tree}\n${parents.join(",")}\n${message}\n${commitCounter}`);
    const commit = { sha, message, tree, parents };
    commits.set(sha, commit);
    return commit;
  }

  function headTree(branch: string): FakeTree | undefined {
    const head = refs.get(branch);
    const commit = head !== undefined ? commits.get(head) : undefined;
    return commit !== undefined ? trees.get(commit.tree) : undefined;
  }

  function isAncestor(ancestor: string, sha: string): boolean {
    const queue = [sha];
    const seen = new Set<string>();
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      if (current === ancestor) return true;
      seen.add(current);
      queue.push(...(commits.get(current)?.parents ?? []));
    }
    return false;
  }

  function commitFile(branch: string, path: string, content: Uint8Array, message: string): FakeCommit {
    const tree: FakeTree = new Map(headTree(branch) ?? []);
    tree.set(path, { mode: "100644", sha: storeBlob(content) });
    const parent = refs.get(branch);
    const commit = storeCommit(message, storeTree(tree), parent !== undefined ? [parent] : []);
    refs.set(branch, commit.sha);
    return commit;
  }

  function commitJson(commit: FakeCommit) {
    return {
      sha: commit.sha,
      message: commit.message,
      tree: { sha: commit.tree },
      parents: commit.parents.map((sha) => ({ sha })),
    };
  }

  function treeJson(sha: string, tree: FakeTree) {
    return {
      sha,
      truncated: false,
      tree: [...tree.entries()].map(([path, entry]) => ({
        path,
        mode: entry.mode,
        type: "blob",
        sha: entry.sha,
        size: blobs.get(entry.sha)?.length ?? 0,
      })),
    };
  }

  function repoJson() {
    return {
      name: repo,
      full_name: `${owner}/${repo}`,
      private: true,
      default_branch: defaultBranch,
      owner: { login: owner },
    };
  }

  const emptyRepository = () => json({ message: "Git Repository is empty." }, 409);
  const notFound = () => json({ message: "Not Found" }, 404);
  const invalid = (message: string) => json({ message }, 422);

  const app = new Hono();

  app.use("*", async (c, next) => {
    const method = c.req.method;
    requests.push(`${method} ${c.req.path}`);

    const planned = failures.findIndex(
      (f) => f.method === method && c.req.path.endsWith(f.pathSuffix),
    );
    if (planned !== -1) {
      const [failure] = failures.splice(planned, 1);
      if (failure) return json(failure.body, failure.status);
    }

    if (c.req.header("Authorization") !== `token ${token}`) {
      return json({ message: "Bad credentials" }, 401);
    }

    const repoPrefix = `/repos/${owner}/${repo}`;
    if (c.req.path.startsWith("/repos/")) {
      const ours = c.req.path === repoPrefix || c.req.path.startsWith(`${repoPrefix}/`);
      if (!exists || !ours) return notFound();
    }

    await next();
  });

  app.get("/rate_limit", (c) => {
    const rate = { limit: 5000, remaining: 5000 - requests.length, reset: 0, used: requests.length };
    return c.json({ resources: { core: rate }, rate });
  });

  app.post("/user/repos", async (c) => {
    const body = RepoCreateSchema.parse(await c.req.json<unknown>());
    if (body.name !== repo || exists) {
      return invalid("Repository creation failed.");
    }
    exists = true;
    if (body.auto_init) {
      commitFile(defaultBranch, "README.md", Buffer.from(`# ${repo}\n`), "Initial commit");
    }
    return c.json(repoJson(), 201);
  });

  app.get("/repos/:owner/:repo", (c) => c.json(repoJson()));

  app.get("/repos/:owner/:repo/git/ref/heads/*", (c) => {
    if (isEmpty()) return emptyRepository();
    const branch = tailAfter(c, "/git/ref/heads/");
    const head = refs.get(branch);
    if (head === undefined) return notFound();
    return c.json({ ref: `refs/heads/${branch}`, object: { sha: head, type: "commit" } });
  });

  app.post("/repos/:owner/:repo/git/refs", async (c) => {
    if (isEmpty()) return emptyRepository();
    const body = RefCreateSchema.parse(await c.req.json<unknown>());
    const branch = body.ref.replace(/^refs\/heads\//, "");
    if (refs.has(branch)) return invalid("Reference already exists");
    if (!commits.has(body.sha)) return invalid("Object does not exist");
    refs.set(branch, body.sha);
    return c.json({ ref: body.ref, object: { sha: body.sha, type: "commit" } }, 201);
  });

  app.patch("/repos/:owner/:repo/git/refs/heads/*", async (c) => {
    const branch = tailAfter(c, "/git/refs/heads/");
    const body = RefUpdateSchema.parse(await c.req.json<unknown>());
    const current = refs.get(branch);
    if (current === undefined) return invalid("Reference does not exist");
    if (!commits.has(body.sha)) return invalid("Object does not exist");
    if (!body.force && !isAncestor(current, body.sha)) {
      return invalid("Update is not a fast forward");
    }
    refs.set(branch, body.sha);
    return c.json({ ref: `refs/heads/${branch}`, object: { sha: body.sha, type: "commit" } });
  });

  app.get("/repos/:owner/:repo/git/commits/:sha", (c) => {
    const commit = commits.get(c.req.param("sha"));
    return commit ? c.json(commitJson(commit)) : notFound();
  });

  app.post("/repos/:owner/:repo/git/commits", async (c) => {
    if (isEmpty()) return emptyRepository();
    const body = CommitInputSchema.parse(await c.req.json<unknown>());
    if (!trees.has(body.tree)) return invalid("Tree SHA does not exist");
    if (body.parents.some((sha) => !commits.has(sha))) {
      return invalid("Parent SHA does not exist or is not a commit object");
    }
    return c.json(commitJson(storeCommit(body.message, body.tree, body.parents)), 201);
  });

  app.get("/repos/:owner/:repo/git/trees/:sha", (c) => {
    const sha = c.req.param("sha");
    const tree = trees.get(sha);
    return tree ? c.json(treeJson(sha, tree)) : notFound();
  });

  app.post("/repos/:owner/:repo/git/trees", async (c) => {
    if (isEmpty()) return emptyRepository();
    const body = TreeInputSchema.parse(await c.req.json<unknown>());

    let base: FakeTree = new Map();
    if (body.base_tree !== undefined) {
      const found = trees.get(body.base_tree);
      if (!found) return invalid("Invalid tree info");
      base = new Map(found);
    }

    for (const entry of body.tree) {
      if (entry.sha === null) {
        for (const path of [...base.keys()]) {
          if (path === entry.path || path.startsWith(`${entry.path}/`)) base.delete(path);
        }
        continue;
      }
      if (entry.type !== "blob" || !blobs.has(entry.sha)) {
        return invalid("Invalid tree info");
      }
      base.set(entry.path, { mode: entry.mode, sha: entry.sha });
    }

    const sha = storeTree(base);
    return c.json(treeJson(sha, base), 201);
  });

  app.post("/repos/:owner/:repo/git/blobs", async (c) => {
    if (isEmpty()) return emptyRepository();
    const body = BlobInputSchema.parse(await c.req.json<unknown>());
    const content = Buffer.from(body.content, body.encoding === "base64" ? "base64" : "utf-8");
    return c.json({ sha: storeBlob(content) }, 201);
  });

  app.get("/repos/:owner/:repo/git/blobs/:sha", (c) => {
    const sha = c.req.param("sha");
    const blob = blobs.get(sha);
    if (!blob) return notFound();
    return c.json({ sha, content: wrappedBase64(blob), encoding: "base64", size: blob.length });
  });

  app.get("/repos/:owner/:repo/contents/*", (c) => {
    if (isEmpty()) return json({ message: "This repository is empty." }, 404);
    const path = tailAfter(c, "/contents/").replace(/\/+$/, "");
    const tree = headTree(c.req.query("ref") ?? defaultBranch);
    if (!tree) return notFound();

    const file = tree.get(path);
    if (file) {
      const blob = blobs.get(file.sha) ?? Buffer.alloc(0);
      const inline = blob.length <= inlineLimit;
      return c.json({
        type: "file",
        name: path.split("/").pop() ?? path,
        path,
        sha: file.sha,
        size: blob.length,
        encoding: inline ? "base64" : "none",
        content: inline ? wrappedBase64(blob) : "",
      });
    }

    const prefix = path === "" ? "" : `${path}/`;
    const children = new Map<string, { type: "file" | "dir"; sha: string; size: number }>();
    for (const [entryPath, entry] of tree) {
      if (!entryPath.startsWith(prefix)) continue;
      const [name, ...rest] = entryPath.slice(prefix.length).split("/");
      if (name === undefined || children.has(name)) continue;
      children.set(
        name,
        rest.length > 0
          ? { type: "dir", sha: sha1(`${prefix}${name}`), size: 0 }
          : { type: "file", sha: entry.sha, size: blobs.get(entry.sha)?.length ?? 0 },
      );
    }
    if (children.size === 0) return notFound();

    return c.json(
      [...children.entries()].map(([name, child]) => ({
        type: child.type,
        name,
        path: `${prefix}${name}`,
        sha: child.sha,
        size: child.size,
      })),
    );
  });

  app.put("/repos/:owner/:repo/contents/*", async (c) => {
    const path = tailAfter(c, "/contents/");
    const body = ContentsPutSchema.parse(await c.req.json<unknown>());
    const branch = body.branch ?? defaultBranch;

    if (!isEmpty() && !refs.has(branch)) {
      return notFound();
    }
    const existing = headTree(branch)?.get(path);
    if (existing && body.sha !== existing.sha) {
      return invalid(`"sha" wasn't supplied.`);
    }

    const commit = commitFile(branch, path, Buffer.from(body.content, "base64"), body.message);
    const blob = headTree(branch)?.get(path);
    return c.json(
      {
        content: { sha: blob?.sha ?? "", path, name: path.split("/").pop() ?? path },
        commit: { sha: commit.sha },
      },
      existing ? 200 : 201,
    );
  });

  return {
    app,
    fetch: async (url, init) => app.request(url, init),
    apiUrl,
    owner,
    repo,
    token,
    requests,

    headOf(branch) {
      return refs.get(branch);
    },

    history(branch) {
      const chain: FakeCommit[] = [];
      let sha = refs.get(branch);
      while (sha !== undefined) {
        const commit = commits.get(sha);
        if (!commit) break;
        chain.push(commit);
        sha = commit.parents[0];
      }
      return chain;
    },

    readFile(branch, path) {
      const entry = headTree(branch)?.get(path);
      return entry ? blobs.get(entry.sha) : undefined;
    },

    listFiles(branch) {
      return [...(headTree(branch)?.keys() ?? [])].sort();
    },

    seedFile(branch, path, content) {
      const bytes = typeof content === "string" ? Buffer.from(content) : content;
      return commitFile(branch, path, bytes, `Add ${path}`).sha;
    },

    failNext(method, pathSuffix, status, body = { message: "Injected failure" }) {
      failures.push({ method, pathSuffix, status, body });
    },
  };
}

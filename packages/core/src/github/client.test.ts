import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { createGitHubClient, createRemoteRepository, encodePath } from "./client.js";
import {
  AuthError,
  NotFoundError,
  RemoteApiError,
} from "../errors/catalog.js";

const API_URL = "https://api.github.com";
const OWNER = "octo-cat";
const REPO = "dotfiles";
const TOKEN = "test-token";

describe("GitHubClient", () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    globalThis.fetch = vi.fn();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function mockFetchResponse(status: number, body?: unknown) {
    vi.mocked(globalThis.fetch).mockResolvedValueOnce(
      new Response(body === undefined ? null : JSON.stringify(body), {
        status,
        headers: { "Content-Type": "application/json" },
      }),
    );
  }

  function fetchCall(index = 0): [string, RequestInit] {
    const call = vi.mocked(globalThis.fetch).mock.calls[index];
    if (!call) throw new Error(`fetch was not called ${index + 1} times`);
    return [String(call[0]), call[1] ?? {}];
  }

  function client() {
    return createGitHubClient({
      apiUrl: API_URL,
      owner: OWNER,
      repo: REPO,
      token: TOKEN,
    });
  }

  describe("headers", () => {
    it("sends the GitHub media type and a token Authorization header", async () => {
      mockFetchResponse(200, {
        name: REPO,
        full_name: `${OWNER}/${REPO}`,
        private: true,
        default_branch: "main",
        owner: { login: OWNER },
      });

      const repo = await client().getRepository();

      expect(repo.full_name).toBe("octo-cat/dotfiles");
      const [url, init] = fetchCall();
      expect(url).toBe(`${API_URL}/repos/${OWNER}/${REPO}`);
      expect(init.method).toBe("GET");
      expect(init.headers).toEqual({
        Accept: "application/vnd.github+json",
        Authorization: "token test-token",
      });
      expect(init.body).toBeUndefined();
    });

    it("adds a JSON content type when a body is sent", async () => {
      mockFetchResponse(201, { sha: "blob1" });

      await client().createBlob(new TextEncoder().encode("hi"));

      const [, init] = fetchCall();
      expect((init.headers as Record<string, string>)["Content-Type"]).toBe(
        "application/json",
      );
    });
  });

  describe("getBranchHead", () => {
    it("returns the ref when the branch exists", async () => {
      mockFetchResponse(200, {
        ref: "refs/heads/main",
        node_id: "ignored",
        object: { sha: "c1", type: "commit", url: "ignored" },
      });

      const head = await client().getBranchHead("main");

      expect(head).toEqual({
        state: "exists",
        ref: { ref: "refs/heads/main", object: { sha: "c1", type: "commit" } },
      });
      expect(fetchCall()[0]).toBe(
        `${API_URL}/repos/${OWNER}/${REPO}/git/ref/heads/main`,
      );
    });

    it("reports an empty repository on 409", async () => {
      mockFetchResponse(409, { message: "Git Repository is empty." });

      expect(await client().getBranchHead("main")).toEqual({
        state: "empty-repository",
      });
    });

    it("reports a missing branch on 404", async () => {
      mockFetchResponse(404, { message: "Not Found" });

      expect(await client().getBranchHead("feature/x")).toEqual({
        state: "missing",
      });
      expect(fetchCall()[0]).toBe(
        `${API_URL}/repos/${OWNER}/${REPO}/git/ref/heads/feature/x`,
      );
    });

    it("throws AuthError on 401", async () => {
      mockFetchResponse(401, { message: "Bad credentials" });

      await expect(client().getBranchHead("main")).rejects.toBeInstanceOf(
        AuthError,
      );
    });
  });

  describe("createBranchRef", () => {
    it("POSTs a fully qualified ref", async () => {
      mockFetchResponse(201, {
        ref: "refs/heads/backup",
        object: { sha: "c9", type: "commit" },
      });

      await client().createBranchRef("backup", "c9");

      const [url, init] = fetchCall();
      expect(url).toBe(`${API_URL}/repos/${OWNER}/${REPO}/git/refs`);
      expect(init.method).toBe("POST");
      expect(JSON.parse(String(init.body))).toEqual({
        ref: "refs/heads/backup",
        sha: "c9",
      });
    });
  });

  describe("updateBranchRef", () => {
    it("PATCHes refs/heads with sha and force", async () => {
      mockFetchResponse(200, {
        ref: "refs/heads/main",
        object: { sha: "c2", type: "commit" },
      });

      await client().updateBranchRef("main", { sha: "c2", force: true });

      const [url, init] = fetchCall();
      expect(url).toBe(`${API_URL}/repos/${OWNER}/${REPO}/git/refs/heads/main`);
      expect(init.method).toBe("PATCH");
      expect(JSON.parse(String(init.body))).toEqual({ sha: "c2", force: true });
    });

    it("surfaces a non-fast-forward rejection as RemoteApiError with the body", async () => {
      mockFetchResponse(422, { message: "Update is not a fast forward" });

      const err = await client()
        .updateBranchRef("main", { sha: "c2" })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RemoteApiError);
      expect(err).toMatchObject({
        status: 422,
        body: '{"message":"Update is not a fast forward"}',
      });
    });
  });

  describe("createBlob", () => {
    it("sends the bytes base64-encoded", async () => {
      mockFetchResponse(201, { sha: "b1", url: "ignored" });

      const blob = await client().createBlob(new Uint8Array([0, 255, 104, 105]));

      expect(blob).toEqual({ sha: "b1" });
      const [url, init] = fetchCall();
      expect(url).toBe(`${API_URL}/repos/${OWNER}/${REPO}/git/blobs`);
      expect(init.method).toBe("POST");
      expect(JSON.parse(String(init.body))).toEqual({
        content: "AP9oaQ==",
        encoding: "base64",
      });
    });
  });

  describe("createTree / createCommit", () => {
    it("posts the tree request unchanged", async () => {
      mockFetchResponse(201, { sha: "t2", tree: [] });

      const request = {
        base_tree: "t1",
        tree: [
          { path: "a.txt", mode: "100644" as const, type: "blob" as const, sha: "b1" },
          { path: "old.txt", mode: "100644" as const, type: "blob" as const, sha: null },
        ],
      };
      const tree = await client().createTree(request);

      expect(tree.sha).toBe("t2");
      expect(JSON.parse(String(fetchCall()[1].body))).toEqual(request);
    });

    it("posts the commit request and parses parents", async () => {
      mockFetchResponse(201, {
        sha: "c2",
        message: "Update registered files",
        tree: { sha: "t2", url: "ignored" },
        parents: [{ sha: "c1", url: "ignored" }],
      });

      const commit = await client().createCommit({
        message: "Update registered files",
        tree: "t2",
        parents: ["c1"],
      });

      expect(commit).toEqual({
        sha: "c2",
        message: "Update registered files",
        tree: { sha: "t2" },
        parents: [{ sha: "c1" }],
      });
    });
  });

  describe("getContents", () => {
    it("encodes each path segment and passes the ref", async () => {
      mockFetchResponse(200, {
        type: "file",
        name: "my notes.txt",
        path: "docs/my notes.txt",
        sha: "b1",
        size: 5,
        encoding: "base64",
        content: "aGVsbG8=\n",
      });

      const res = await client().getContents("docs/my notes.txt", "main");

      expect(fetchCall()[0]).toBe(
        `${API_URL}/repos/${OWNER}/${REPO}/contents/docs/my%20notes.txt?ref=main`,
      );
      expect(Array.isArray(res)).toBe(false);
    });

    it("parses a directory listing as an array", async () => {
      mockFetchResponse(200, [
        { type: "file", name: "a", path: "docs/a", sha: "b1", size: 1 },
        { type: "dir", name: "sub", path: "docs/sub", sha: "t1", size: 0 },
      ]);

      const res = await client().getContents("docs");

      expect(res).toEqual([
        { type: "file", name: "a", path: "docs/a", sha: "b1", size: 1 },
        { type: "dir", name: "sub", path: "docs/sub", sha: "t1", size: 0 },
      ]);
      expect(fetchCall()[0]).toBe(`${API_URL}/repos/${OWNER}/${REPO}/contents/docs`);
    });

    it("throws NotFoundError on 404", async () => {
      mockFetchResponse(404, { message: "Not Found" });

      await expect(client().getContents("missing.txt")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe("putContents", () => {
    it("PUTs message, content and branch", async () => {
      mockFetchResponse(201, {
        content: { sha: "b1", path: ".master", name: ".master" },
        commit: { sha: "c1" },
      });

      const res = await client().putContents(".master", {
        message: "",
        content: "",
        branch: "main",
      });

      expect(res).toEqual({ content: { sha: "b1", path: ".master" }, commit: { sha: "c1" } });
      const [url, init] = fetchCall();
      expect(url).toBe(`${API_URL}/repos/${OWNER}/${REPO}/contents/.master`);
      expect(init.method).toBe("PUT");
    });
  });

  describe("getRateLimit", () => {
    it("reads /rate_limit", async () => {
      const rate = { limit: 5000, remaining: 4999, reset: 1800000000, used: 1 };
      mockFetchResponse(200, { resources: { core: rate }, rate });

      const limits = await client().getRateLimit();

      expect(limits.rate.remaining).toBe(4999);
      expect(fetchCall()[0]).toBe(`${API_URL}/rate_limit`);
    });
  });

  describe("error mapping", () => {
    it("maps 403 to AuthError with the status", async () => {
      mockFetchResponse(403, { message: "Resource not accessible" });

      const err = await client().getCommit("c1").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(AuthError);
      expect(err).toMatchObject({ status: 403 });
    });

    it("maps other failures to RemoteApiError", async () => {
      mockFetchResponse(500, { message: "boom" });

      await expect(client().getTree("t1")).rejects.toThrow(
        'Hosting provider answered 500: {"message":"boom"}',
      );
    });

    it("maps a success response of the wrong shape to RemoteApiError", async () => {
      mockFetchResponse(200, { unexpected: true });

      const err = await client().getCommit("c1").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RemoteApiError);
      expect(err).toMatchObject({
        status: 200,
        body: '{"unexpected":true}',
        details: { resource: "/repos/octo-cat/dotfiles/git/commits/c1" },
      });
    });

    it("maps a success response that is not JSON to RemoteApiError", async () => {
      vi.mocked(globalThis.fetch).mockResolvedValueOnce(
        new Response("<html>maintenance</html>", { status: 200 }),
      );

      const err = await client().getRepository().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RemoteApiError);
      expect(err).toMatchObject({ status: 200, body: "<html>maintenance</html>" });
    });
  });

  describe("createRemoteRepository", () => {
    it("posts to /user/repos with auto_init", async () => {
      mockFetchResponse(201, {
        name: "mirror",
        full_name: "octo-cat/mirror",
        private: false,
        owner: { login: OWNER },
      });

      const repo = await createRemoteRepository(
        { apiUrl: `${API_URL}/`, token: TOKEN },
        { name: "mirror", description: "backups" },
      );

      expect(repo.full_name).toBe("octo-cat/mirror");
      const [url, init] = fetchCall();
      expect(url).toBe(`${API_URL}/user/repos`);
      expect(JSON.parse(String(init.body))).toEqual({
        auto_init: true,
        name: "mirror",
        description: "backups",
      });
    });
  });
});

describe("encodePath", () => {
  it("keeps slashes and escapes the rest", () => {
    expect(encodePath("a b/c#d.txt")).toBe("a%20b/c%23d.txt");
  });
});

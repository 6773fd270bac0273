import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import {
  ConfigurationError,
  InvalidEntryError,
  MissingTokenError,
  NotFoundError,
} from "@filemirror/core/errors";
import { createFakeGitHub, type FakeGitHub } from "@filemirror/core/test-utils";
import { createProgram, reportError } from "./program.js";
import type { CliEnvironment } from "./context.js";

describe("filemirror program", () => {
  let home: string;
  let root: string;
  let fake: FakeGitHub;
  let output: string[];
  let environment: CliEnvironment;

  async function run(...argv: string[]): Promise<string[]> {
    output = [];
    const program = createProgram(environment);
    program.exitOverride();
    await program.parseAsync(["--root", root, ...argv], { from: "user" });
    return output;
  }

  async function writeConfig(github: Record<string, string>): Promise<void> {
    await writeFile(
      join(root, "config.json"),
      JSON.stringify({ github: { apiUrl: fake.apiUrl, ...github } }),
    );
  }

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "cli-test-"));
    root = join(home, ".filemirror");
    vi.stubEnv("HOME", home);
    fake = createFakeGitHub();
    output = [];
    environment = {
      env: { GITHUB_TOKEN: "test-token" },
      print: (line) => output.push(line),
      fetch: fake.fetch,
      logger: pino({ level: "silent" }),
    };
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(home, { recursive: true, force: true });
  });

  it("reports the package version", () => {
    expect(createProgram(environment).version()).toBe("0.1.0");
  });

  describe("register / list / deregister", () => {
    it("lists files in registration order", async () => {
      await run("register", "a.txt", "~/a.txt");
      await run("register", "b.txt", "/etc/b.conf");
      await run("register", "c.txt", "~/c.txt");
      await run("deregister", "b.txt");

      const manifest = await readFile(join(root, "manifest"), "utf-8");
      expect(manifest.split("\n")[0]).toBe("[FILES]");

      const lines = await run("list");
      expect(lines.map((line) => line.replace(/ \(since .*\)$/, ""))).toEqual([
        "a.txt -> ~/a.txt",
        "c.txt -> ~/c.txt",
      ]);
    });

    it("prints the stored timestamp", async () => {
      await run("list");
      await writeFile(
        join(root, "manifest"),
        "[FILES]\nnotes.txt -> ~/notes.txt - 2026-01-21T10:00:00Z\n",
      );

      expect(await run("list")).toEqual([
        "notes.txt -> ~/notes.txt (since 2026-01-21T10:00:00Z)",
      ]);
    });

    it("reports an empty manifest", async () => {
      expect(await run("list")).toEqual(["No files registered"]);
    });

    it("makes relative local paths absolute", async () => {
      const lines = await run("register", "notes.txt", "notes.txt");

      expect(lines).toEqual([`Registered notes.txt -> ${join(process.cwd(), "notes.txt")}`]);
    });

    it("rejects names containing whitespace", async () => {
      await expect(run("register", "my notes.txt", "~/notes.txt")).rejects.toBeInstanceOf(
        InvalidEntryError,
      );
    });

    it("keeps one entry after a duplicate registration and one deregister", async () => {
      await run("register", "a.txt", "~/a.txt");
      await run("register", "a.txt", "~/other-a.txt");
      await run("deregister", "a.txt");

      const lines = await run("list");
      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatch(/^a\.txt -> ~\/other-a\.txt /);
    });

    it("says so when the name is not registered", async () => {
      expect(await run("deregister", "ghost.txt")).toEqual(["ghost.txt is not registered"]);
    });
  });

  describe("upload / download", () => {
    beforeEach(async () => {
      await run("list");
      await writeConfig({ owner: "octo-cat", repo: "dotfiles" });
    });

    it("restores a file after it was cleared", async () => {
      await writeFile(join(home, "notes.txt"), "hello");
      await run("register", "notes.txt", "~/notes.txt");

      const uploaded = await run("upload", "-m", "Sync notes");
      expect(uploaded).toEqual([
        `Uploaded 1 file(s) to main in ${fake.headOf("main")?.slice(0, 7)}`,
      ]);
      expect(fake.history("main")[0]?.message).toBe("Sync notes");

      await writeFile(join(home, "notes.txt"), "");
      const downloaded = await run("download");

      expect(downloaded).toEqual([
        `notes.txt -> ${join(home, "notes.txt")}`,
        "Downloaded 1 file(s)",
      ]);
      expect(await readFile(join(home, "notes.txt"), "utf-8")).toBe("hello");
    });

    it("uses the configured commit message by default", async () => {
      await writeFile(join(home, "a.txt"), "alpha");
      await run("register", "a.txt", "~/a.txt");

      await run("upload");

      expect(fake.history("main")[0]?.message).toBe("Update registered files");
    });

    it("uploads to the branch given on the command line", async () => {
      fake.seedFile("main", "README.md", "# dotfiles\n");
      await writeFile(join(home, "a.txt"), "alpha");
      await run("register", "a.txt", "~/a.txt");

      await run("--branch", "backup", "upload");

      expect(fake.listFiles("backup")).toEqual([".master", "a.txt"]);
      expect(fake.listFiles("main")).toEqual(["README.md"]);
    });

    it("downloads through the manifest stored in the repository", async () => {
      fake.seedFile("main", "notes.txt", "from remote");
      fake.seedFile("main", ".master", "[FILES]\nnotes.txt -> ~/restored.txt\n");

      const lines = await run("download", "--remote-manifest");

      expect(lines).toEqual([
        `notes.txt -> ${join(home, "restored.txt")}`,
        "Downloaded 1 file(s)",
      ]);
      expect(await readFile(join(home, "restored.txt"), "utf-8")).toBe("from remote");
    });

    it("deletes the remote copy when pruning", async () => {
      await writeFile(join(home, "a.txt"), "alpha");
      await writeFile(join(home, "b.txt"), "beta");
      await run("register", "a.txt", "~/a.txt");
      await run("register", "b.txt", "~/b.txt");
      await run("upload");

      const lines = await run("deregister", "b.txt", "--prune");

      expect(lines).toEqual([
        "Deregistered b.txt",
        `Pruned b.txt in ${fake.headOf("main")?.slice(0, 7)}`,
      ]);
      expect(fake.listFiles("main")).toEqual([".master", "a.txt"]);
      expect(fake.readFile("main", ".master")?.toString("utf-8")).toMatch(
        /^\[FILES\]\na\.txt -> ~\/a\.txt - \S+\n$/,
      );
      expect(fake.history("main")[0]?.message).toBe("Remove b.txt");
    });

    it("restores on a fresh root from the manifest published by upload", async () => {
      await writeFile(join(home, "notes.txt"), "hello");
      await run("register", "notes.txt", "~/notes.txt");
      await run("upload");
      await rm(join(home, "notes.txt"));

      root = join(home, "second-machine");
      await run("list");
      await writeConfig({ owner: "octo-cat", repo: "dotfiles" });
      const lines = await run("download", "--remote-manifest");

      expect(lines).toEqual([
        `notes.txt -> ${join(home, "notes.txt")}`,
        "Downloaded 1 file(s)",
      ]);
      expect(await readFile(join(home, "notes.txt"), "utf-8")).toBe("hello");
    });

        it("fails with NotFoundError when a registered file is missing remotely", async () => {
      fake.seedFile("main", "a.txt", "alpha");
      await run("register", "gone.txt", "~/gone.txt");

      await expect(run("download")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("settings", () => {
    it("requires an owner for remote commands", async () => {
      await expect(run("upload")).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("requires a token for remote commands", async () => {
      environment.env = {};

      await expect(
        run("--owner", "octo-cat", "--repo", "dotfiles", "check"),
      ).rejects.toBeInstanceOf(MissingTokenError);
    });

    it("stores the token in the credentials file", async () => {
      const lines = await run("set-token", "test-token");

      expect(lines).toEqual([`Token saved to ${join(root, ".env")}`]);
      expect(await readFile(join(root, ".env"), "utf-8")).toBe("TOKEN=test-token");
    });

    it("reads the token file when the environment has none", async () => {
      environment.env = {};
      await run("set-token", "test-token");
      await writeConfig({ owner: "octo-cat", repo: "dotfiles" });

      expect(await run("check")).toEqual([
        "octo-cat/dotfiles is reachable",
        "API requests left: 4998/5000",
      ]);
    });

    it("creates the repository and remembers it", async () => {
      fake = createFakeGitHub({ exists: false });
      environment.fetch = fake.fetch;
      await run("list");
      await writeConfig({});

      const lines = await run("create-repo", "dotfiles", "-d", "My dotfiles");

      expect(lines).toEqual(["Created octo-cat/dotfiles"]);
      const config: unknown = JSON.parse(await readFile(join(root, "config.json"), "utf-8"));
      expect(config).toMatchObject({
        github: { owner: "octo-cat", repo: "dotfiles", apiUrl: fake.apiUrl },
      });
      expect(fake.listFiles("main")).toEqual(["README.md"]);
    });
  });

  describe("reportError", () => {
    it("logs catalog errors with their code and status", () => {
      const logger = pino({ level: "silent" });
      const error = vi.spyOn(logger, "error");

      reportError(logger, new NotFoundError("notes.txt"));

      expect(error).toHaveBeenCalledWith(
        { errorCode: "NOT_FOUND", status: 404, details: undefined },
        "Not found: notes.txt",
      );
    });
  });
});

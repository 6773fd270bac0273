import {
  ROOT_PATH_ENV,
  loadConfig,
  resolveFromRoot,
  resolveRootPath,
} from "@filemirror/core/config";
import { resolveToken } from "@filemirror/core/credentials";
import { ConfigurationError } from "@filemirror/core/errors";
import {
  createGitHubClient,
  type FetchLike,
  type GitHubClient,
} from "@filemirror/core/github";
import { createLogger, type Logger } from "@filemirror/core/logger";
import { openManifestStore, type ManifestStore } from "@filemirror/core/manifest";
import { MirrorConfigSchema, type MirrorConfig } from "@filemirror/core/schemas";
import type { SyncDeps } from "@filemirror/core/sync";

/** Options every command accepts before its own. */
export interface GlobalOptions {
  root?: string;
  owner?: string;
  repo?: string;
  branch?: string;
  verbose?: boolean;
}

/** What the process provides; tests swap in their own. */
export interface CliEnvironment {
  env: NodeJS.ProcessEnv;
  print: (line: string) => void;
  fetch?: FetchLike;
  logger?: Logger;
}

export interface MirrorContext {
  rootPath: string;
  /** Stored config with command-line overrides applied. */
  config: MirrorConfig;
  logger: Logger;
  manifestPath: string;
  credentialsPath: string;
  print: (line: string) => void;
  fetch?: FetchLike;
  openManifest(): Promise<ManifestStore>;
  token(): Promise<string>;
  client(): Promise<GitHubClient>;
  syncDeps(): Promise<SyncDeps>;
}

export async function createMirrorContext(
  options: GlobalOptions,
  environment: CliEnvironment,
): Promise<MirrorContext> {
  const rootPath = resolveRootPath(options.root ?? environment.env[ROOT_PATH_ENV]);
  const stored = await loadConfig({ rootPath });

  const config = MirrorConfigSchema.parse({
    ...stored,
    github: {
      ...stored.github,
      ...(options.owner !== undefined && { owner: options.owner }),
      ...(options.repo !== undefined && { repo: options.repo }),
      ...(options.branch !== undefined && { branch: options.branch }),
    },
    logging: {
      ...stored.logging,
      ...(options.verbose && { level: "debug" }),
    },
  });

  const logger = environment.logger ?? createLogger(config.logging);
  const manifestPath = resolveFromRoot(rootPath, config.manifest.path);
  const credentialsPath = resolveFromRoot(rootPath, config.credentials.path);

  const token = () => resolveToken(credentialsPath, environment.env);

  async function client(): Promise<GitHubClient> {
    const { owner, repo, apiUrl } = config.github;
    if (owner === undefined) {
      throw new ConfigurationError("github.owner", "set it in config.json or pass --owner");
    }
    if (repo === undefined) {
      throw new ConfigurationError("github.repo", "set it in config.json or pass --repo");
    }
    return createGitHubClient({
      apiUrl,
      owner,
      repo,
      token: await token(),
      fetch: environment.fetch,
    });
  }

  logger.debug({ rootPath, manifestPath, branch: config.github.branch }, "Context ready");

  return {
    rootPath,
    config,
    logger,
    manifestPath,
    credentialsPath,
    print: environment.print,
    fetch: environment.fetch,
    openManifest: () => openManifestStore(manifestPath),
    token,
    client,
    async syncDeps() {
      return { client: await client(), branch: config.github.branch, logger };
    },
  };
}

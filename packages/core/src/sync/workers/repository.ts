import type { Repository } from "../../github/types.js";
import type { SyncDeps } from "../types.js";

/**
 * Confirm the configured repository is reachable with the token. A missing
 * repository surfaces as NotFoundError from the client.
 */
export async function checkRepository(deps: SyncDeps): Promise<Repository> {
  const { client, branch, logger } = deps;
  const repository = await client.getRepository();

  logger.info(
    {
      repository: repository.full_name,
      private: repository.private,
      defaultBranch: repository.default_branch,
    },
    "Repository reachable",
  );
  if (repository.default_branch && repository.default_branch !== branch) {
    logger.warn(
      { branch, defaultBranch: repository.default_branch },
      "Mirroring to a branch other than the repository default",
    );
  }

  return repository;
}

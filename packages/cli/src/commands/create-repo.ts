import { loadConfig, saveConfig } from "@filemirror/core/config";
import { createRemoteRepository } from "@filemirror/core/github";
import type { CommandArgs } from "../program.js";

export const registerCreateRepoCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("create-repo")
    .description("Create a private repository and mirror to it")
    .argument("<name>", "Repository name")
    .option("-d, --description <text>", "Repository description")
    .option("--public", "Make the repository public")
    .action(async (name: string, options: { description?: string; public?: boolean }) => {
      const ctx = await context();

      const repository = await createRemoteRepository(
        { apiUrl: ctx.config.github.apiUrl, token: await ctx.token(), fetch: ctx.fetch },
        {
          name,
          private: !options.public,
          ...(options.description !== undefined && { description: options.description }),
        },
      );

      // Point the stored config at the new repository
      const stored = await loadConfig({ rootPath: ctx.rootPath });
      await saveConfig(
        {
          ...stored,
          github: { ...stored.github, owner: repository.owner.login, repo: repository.name },
        },
        { rootPath: ctx.rootPath },
      );

      ctx.logger.info({ repository: repository.full_name }, "Created repository");
      ctx.print(`Created ${repository.full_name}`);
    });
};

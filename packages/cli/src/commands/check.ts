import { checkRepository } from "@filemirror/core/sync";
import type { CommandArgs } from "../program.js";

export const registerCheckCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("check")
    .description("Verify the token and repository")
    .action(async () => {
      const ctx = await context();
      const deps = await ctx.syncDeps();

      const repository = await checkRepository(deps);
      const { rate } = await deps.client.getRateLimit();

      ctx.print(`${repository.full_name} is reachable`);
      ctx.print(`API requests left: ${rate.remaining}/${rate.limit}`);
    });
};

import { manifestFile, uploadAll } from "@filemirror/core/sync";
import type { CommandArgs } from "../program.js";

export const registerDeregisterCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("deregister")
    .description("Remove a file from the manifest")
    .argument("<remoteName>", "Path of the file inside the repository")
    .option("--prune", "Also delete the file from the branch")
    .action(async (remoteName: string, options: { prune?: boolean }) => {
      const ctx = await context();
      const store = await ctx.openManifest();

      const removed = store.deregister(remoteName);
      if (removed === null) {
        ctx.logger.warn({ remoteName }, "Not registered");
        ctx.print(`${remoteName} is not registered`);
        return;
      }
      await store.flush();
      ctx.print(`Deregistered ${removed.remoteName}`);

      if (!options.prune) return;

      // Another registration under the same name still owns the remote file
      if (store.list().some((entry) => entry.remoteName === remoteName)) {
        ctx.logger.warn({ remoteName }, "Name still registered, not pruning");
        return;
      }
      // The published manifest drops the name in the same commit
      const result = await uploadAll(await ctx.syncDeps(), [manifestFile(store)], {
        message: `Remove ${remoteName}`,
        remove: [remoteName],
      });
      ctx.print(`Pruned ${remoteName} in ${result.commitSha.slice(0, 7)}`);
    });
};

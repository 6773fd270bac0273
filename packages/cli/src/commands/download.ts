import { createMirror } from "@filemirror/core/sync";
import type { CommandArgs } from "../program.js";

export const registerDownloadCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("download")
    .description("Overwrite every registered file with its copy on the branch")
    .option("--remote-manifest", "Use the manifest stored in the repository")
    .action(async (options: { remoteManifest?: boolean }) => {
      const ctx = await context();
      const mirror = createMirror({
        ...(await ctx.syncDeps()),
        manifest: await ctx.openManifest(),
      });

      const files = await mirror.download({ remoteManifest: options.remoteManifest });

      for (const file of files) {
        ctx.print(`${file.remoteName} -> ${file.localPath}`);
      }
      ctx.print(`Downloaded ${files.length} file(s)`);
    });
};

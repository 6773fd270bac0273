import { REMOTE_MANIFEST_PATH, createMirror } from "@filemirror/core/sync";
import type { CommandArgs } from "../program.js";

export const registerUploadCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("upload")
    .description("Publish every registered file as one commit")
    .option("-m, --message <message>", "Commit message")
    .action(async (options: { message?: string }) => {
      const ctx = await context();
      const mirror = createMirror({
        ...(await ctx.syncDeps()),
        manifest: await ctx.openManifest(),
      });

      const result = await mirror.upload({
        message: options.message ?? ctx.config.commit.message,
      });

      const count = result.files.filter((f) => f.remoteName !== REMOTE_MANIFEST_PATH).length;
      const short = result.commitSha.slice(0, 7);
      ctx.print(`Uploaded ${count} file(s) to ${ctx.config.github.branch} in ${short}`);
    });
};

import { resolve } from "node:path";
import type { CommandArgs } from "../program.js";

/** Home-relative paths stay as typed; anything else is made absolute. */
export function normalizeLocalPath(localPath: string): string {
  return localPath === "~" || localPath.startsWith("~/") ? localPath : resolve(localPath);
}

export const registerRegisterCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("register")
    .description("Add a local file to the manifest")
    .argument("<remoteName>", "Path of the file inside the repository")
    .argument("<localPath>", "Path of the file on this machine")
    .action(async (remoteName: string, localPath: string) => {
      const ctx = await context();
      const store = await ctx.openManifest();

      const entry = store.register(remoteName, normalizeLocalPath(localPath));
      await store.flush();

      ctx.logger.info({ remoteName, localPath: entry.localPath }, "Registered file");
      ctx.print(`Registered ${entry.remoteName} -> ${entry.localPath}`);
    });
};

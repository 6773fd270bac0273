import type { CommandArgs } from "../program.js";

export const registerListCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("list")
    .description("Show registered files")
    .action(async () => {
      const ctx = await context();
      const entries = (await ctx.openManifest()).list();

      if (entries.length === 0) {
        ctx.print("No files registered");
        return;
      }
      for (const entry of entries) {
        const since = entry.registeredAt ? ` (since ${entry.registeredAt})` : "";
        ctx.print(`${entry.remoteName} -> ${entry.localPath}${since}`);
      }
    });
};

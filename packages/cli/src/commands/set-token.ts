import { writeTokenFile } from "@filemirror/core/credentials";
import type { CommandArgs } from "../program.js";

export const registerSetTokenCommand = (args: CommandArgs): void => {
  const { program, context } = args;

  program
    .command("set-token")
    .description("Store the access token in the credentials file")
    .argument("<token>", "Personal access token")
    .action(async (token: string) => {
      const ctx = await context();
      await writeTokenFile(ctx.credentialsPath, token.trim());
      ctx.print(`Token saved to ${ctx.credentialsPath}`);
    });
};

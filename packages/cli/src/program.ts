import { Command } from "commander";
import { MirrorError } from "@filemirror/core/errors";
import type { Logger } from "@filemirror/core/logger";
import {
  createMirrorContext,
  type CliEnvironment,
  type GlobalOptions,
  type MirrorContext,
} from "./context.js";
import { registerCheckCommand } from "./commands/check.js";
import { registerCreateRepoCommand } from "./commands/create-repo.js";
import { registerDeregisterCommand } from "./commands/deregister.js";
import { registerDownloadCommand } from "./commands/download.js";
import { registerListCommand } from "./commands/list.js";
import { registerRegisterCommand } from "./commands/register.js";
import { registerSetTokenCommand } from "./commands/set-token.js";
import { registerUploadCommand } from "./commands/upload.js";
import pkg from "../package.json" with { type: "json" };

/** Builds the context for the command being run from the global options. */
export type ContextFactory = () => Promise<MirrorContext>;

export interface CommandArgs {
  program: Command;
  context: ContextFactory;
}

export function createProgram(environment: CliEnvironment): Command {
  const program = new Command();

  program
    .name("filemirror")
    .version(pkg.version)
    .description("Mirror registered local files to a GitHub repository branch")
    .option("-r, --root <path>", "Root directory (default: ~/.filemirror)")
    .option("-o, --owner <name>", "Repository owner")
    .option("-R, --repo <name>", "Repository name")
    .option("-b, --branch <name>", "Branch to mirror to")
    .option("-v, --verbose", "Log debug output")
    .addHelpText(
      "after",
      `
Examples:
  $ filemirror set-token <token>
  $ filemirror register notes.txt ~/notes.txt
  $ filemirror --owner octo-cat --repo dotfiles upload -m "Sync notes"
  $ filemirror download --remote-manifest
`,
    );

  const context: ContextFactory = () =>
    createMirrorContext(program.opts<GlobalOptions>(), environment);

  registerRegisterCommand({ program, context });
  registerDeregisterCommand({ program, context });
  registerListCommand({ program, context });
  registerUploadCommand({ program, context });
  registerDownloadCommand({ program, context });
  registerCreateRepoCommand({ program, context });
  registerCheckCommand({ program, context });
  registerSetTokenCommand({ program, context });

  return program;
}

/** Logs a failure the way the commands log everything else. */
export function reportError(logger: Logger, err: unknown): void {
  if (err instanceof MirrorError) {
    logger.error(
      { errorCode: err.errorCode, status: err.status, details: err.details },
      err.message,
    );
    return;
  }
  logger.error({ err }, "Unexpected failure");
}

export { createProgram, reportError, type CommandArgs, type ContextFactory } from "./program.js";
export {
  createMirrorContext,
  type CliEnvironment,
  type GlobalOptions,
  type MirrorContext,
} from "./context.js";
export { normalizeLocalPath } from "./commands/register.js";

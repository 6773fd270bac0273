export {
  DEFAULTS,
  MirrorConfigSchema,
  type MirrorConfig,
  type GitHubConfig,
  type LoggingConfig,
} from "./mirror-config.js";

export {
  DEFAULT_ROOT_PATH,
  ROOT_PATH_ENV,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveFromRoot, resolveRootPath } from "./paths.js";

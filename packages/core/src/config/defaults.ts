import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".filemirror");

/** Environment variable that moves the root directory. */
export const ROOT_PATH_ENV = "FILEMIRROR_ROOT_PATH";

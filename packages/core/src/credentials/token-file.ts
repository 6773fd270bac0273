import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { LocalIoError, MissingTokenError } from "../errors/catalog.js";

/** Environment variable that takes precedence over the token file. */
export const TOKEN_ENV = "GITHUB_TOKEN";

/**
 * Reads a `TOKEN=<value>` file. The value is whatever follows the last "="
 * on the first line.
 */
export async function readTokenFile(path: string): Promise<string> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new MissingTokenError(path);
    }
    throw new LocalIoError(path, err);
  }

  const firstLine = raw.split("\n")[0] ?? "";
  const token = (firstLine.split("=").pop() ?? "").trim();
  if (!token) {
    throw new MissingTokenError(path);
  }
  return token;
}

/** Writes the token file, replacing any previous token. */
export async function writeTokenFile(path: string, token: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `TOKEN=${token}`, { encoding: "utf-8", mode: 0o600 });
  } catch (err: unknown) {
    throw new LocalIoError(path, err);
  }
}

/** Token from the environment, falling back to the token file. */
export async function resolveToken(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const fromEnv = env[TOKEN_ENV]?.trim();
  if (fromEnv) return fromEnv;
  return readTokenFile(path);
}

import { z } from "zod";

export const DEFAULTS = {
  github: {
    apiUrl: "https://api.github.com",
    branch: "main",
  },
  manifest: {
    path: "manifest",
  },
  credentials: {
    path: ".env",
  },
  commit: {
    message: "Update registered files",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

/** Owner and repository names as GitHub accepts them. */
const GitHubName = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_.-]+$/, "must be a GitHub owner or repository name");

export const MirrorConfigSchema = z.object({
  github: z
    .object({
      apiUrl: z.url().default(DEFAULTS.github.apiUrl),
      owner: GitHubName.optional().describe("Account that owns the mirror repository"),
      repo: GitHubName.optional(),
      branch: z.string().min(1).default(DEFAULTS.github.branch),
    })
    .default(DEFAULTS.github),
  manifest: z
    .object({
      path: z.string().min(1).default(DEFAULTS.manifest.path),
    })
    .default(DEFAULTS.manifest),
  credentials: z
    .object({
      path: z.string().min(1).default(DEFAULTS.credentials.path),
    })
    .default(DEFAULTS.credentials),
  commit: z
    .object({
      message: z.string().min(1).default(DEFAULTS.commit.message),
    })
    .default(DEFAULTS.commit),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
});

export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;
export type LoggingConfig = MirrorConfig["logging"];
export type GitHubConfig = MirrorConfig["github"];

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import { z } from "zod";

export const CONFIG_DIR = join(homedir(), ".config", "mcp-watch");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");
export const DEFAULT_STATUS_FILE = join(
  homedir(),
  "mcp-servers",
  ".ai-docs",
  "context",
  "server-health-status.md",
);
export const DEFAULT_DESCRIPTION = "MCP Server";

const STATUS_FILE_ENV = "MCP_WATCH_STATUS_FILE";

// ── Config Schema (Zod) ──

const REPO_NAME_PATTERN = /^[\w.-]+\/[\w.-]+$/;

const REPO_TARGET_SCHEMA = z.object({
  name: z.string().regex(REPO_NAME_PATTERN, "Must be owner/repo format"),
  description: z.string().default(DEFAULT_DESCRIPTION),
});

export type RepoTarget = z.infer<typeof REPO_TARGET_SCHEMA>;

/** Watched when the config file names no repos. Iterated in this order. */
export const DEFAULT_REPOS: readonly RepoTarget[] = [
  { name: "modelcontextprotocol/servers", description: "Official MCP server repository" },
  { name: "modelcontextprotocol/servers-archived", description: "Archived MCP servers" },
  { name: "brave/brave-search-mcp-server", description: "Brave Search MCP" },
  { name: "anaisbetts/mcp-installer", description: "MCP Installer" },
];

const WATCH_CONFIG_SCHEMA = z.object({
  version: z.number().int().default(1),
  repos: z
    .array(REPO_TARGET_SCHEMA)
    .min(1)
    .default(() => [...DEFAULT_REPOS]),
  statusFile: z
    .string()
    .refine((p) => isAbsolute(p), { message: "statusFile must be an absolute path" })
    .default(DEFAULT_STATUS_FILE),
});

export type WatchConfig = z.infer<typeof WATCH_CONFIG_SCHEMA>;

// ── Config Access ──

const RAW_CONFIG_SCHEMA = z.record(z.string(), z.unknown());

function loadRawConfig(file: string): Record<string, unknown> {
  if (!existsSync(file)) return {};
  try {
    const result = RAW_CONFIG_SCHEMA.safeParse(JSON.parse(readFileSync(file, "utf-8")));
    return result.success ? result.data : {};
  } catch {
    return {};
  }
}

/**
 * Load the watch config. A missing or unreadable file yields the defaults;
 * a file that fails validation throws. `MCP_WATCH_STATUS_FILE` wins over
 * the file's `statusFile`.
 */
export function loadConfig(file: string = CONFIG_FILE): WatchConfig {
  const raw = loadRawConfig(file);
  const statusFileOverride = process.env[STATUS_FILE_ENV];
  if (statusFileOverride) {
    raw["statusFile"] = statusFileOverride;
  }
  return WATCH_CONFIG_SCHEMA.parse(raw);
}

export function validateRepoName(name: string): boolean {
  return REPO_NAME_PATTERN.test(name);
}

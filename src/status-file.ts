import { appendFileSync, existsSync, readFileSync, statSync } from "node:fs";
import { repoWebUrl } from "./github.js";

export const STATUS_ANNOTATION = "Custom (releases + security alerts)";

export function formatStatusLine(repo: string): string {
  return `- [ ] \`${repoWebUrl(repo)}\` - ${STATUS_ANNOTATION}`;
}

/**
 * Append a checklist line for `repo` to an existing status file.
 * Returns false, without creating anything, when the path is absent or
 * is not a regular file.
 * Entries are not deduplicated.
 */
export function appendStatusEntry(file: string, repo: string): boolean {
  if (!existsSync(file) || !statSync(file).isFile()) return false;
  const current = readFileSync(file, "utf-8");
  const separator = current.length > 0 && !current.endsWith("\n") ? "\n" : "";
  appendFileSync(file, `${separator}${formatStatusLine(repo)}\n`, "utf-8");
  return true;
}

import { execFileSync } from "node:child_process";

const GH_TIMEOUT_MS = 30_000;

// stderr is piped so gh's own diagnostics never reach the terminal.
function runGh(args: string[]): string {
  return execFileSync("gh", args, {
    encoding: "utf-8",
    timeout: GH_TIMEOUT_MS,
    stdio: ["ignore", "pipe", "pipe"],
  }).trim();
}

export function isGhAuthenticated(): boolean {
  try {
    runGh(["auth", "status"]);
    return true;
  } catch {
    return false;
  }
}

/**
 * Subscribe the authenticated user to a repository (watch, not ignored).
 * Any failure (network, permissions, rate limit, timeout) yields `false`.
 */
export function setRepoSubscription(repo: string): boolean {
  try {
    runGh([
      "api",
      "--method",
      "PUT",
      `repos/${repo}/subscription`,
      "--field",
      "subscribed=true",
      "--field",
      "ignored=false",
    ]);
    return true;
  } catch {
    return false;
  }
}

export function repoWebUrl(repo: string): string {
  return `https://github.com/${repo}`;
}

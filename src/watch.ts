import { basename } from "node:path";
import { requireGhAuth } from "./auth.js";
import type { RepoTarget } from "./config.js";
import { DEFAULT_DESCRIPTION, validateRepoName } from "./config.js";
import { repoWebUrl, setRepoSubscription } from "./github.js";
import { errorOut, logInfo, logWarn, printBanner, RULE } from "./output.js";
import { appendStatusEntry } from "./status-file.js";

export const BIN_NAME = "mcp-watch";

// ── Types ──

export interface BatchResult {
  total: number;
  succeeded: string[];
  failed: string[];
}

export interface AddOptions {
  /** Called once the arguments are valid, before any gh call. */
  resolveStatusFile: () => string;
}

// ── Single repository ──

/** Watch one repository. Returns false on any failure; the cause is not kept. */
export function setupWatch(target: RepoTarget): boolean {
  logInfo(`Configuring: ${target.name} (${target.description})`);
  if (!setRepoSubscription(target.name)) {
    logWarn(`Failed to enable watch: ${target.name}`);
    return false;
  }
  logInfo(`✅ Watch enabled: ${target.name}`);
  return true;
}

/**
 * The API cannot narrow a repository's notifications to releases or security
 * alerts, so point the user at the web UI instead.
 */
export function optimizeNotifications(repo: string): void {
  logInfo(`Optimizing notifications: ${repo}`);
  logInfo(`ℹ️  Fine-tune notifications manually at ${repoWebUrl(repo)}`);
  logInfo("   Recommended: Custom → ✅ Releases ✅ Security alerts");
}

// ── Batch ──

function printBatchSummary(result: BatchResult): void {
  console.log(RULE);
  logInfo(`Done: ${result.succeeded.length}/${result.total} repositories`);

  if (result.failed.length === 0) {
    logInfo("🎉 All watches are set up!");
    logInfo("");
    logInfo("Next steps:");
    logInfo("1. Fine-tune notification types on each repository page");
    logInfo("2. Adjust email frequency in your GitHub notification settings");
    logInfo(`3. Watch new MCP servers as you adopt them: ${BIN_NAME} add <owner/repo>`);
  } else {
    logWarn("Some repositories could not be watched. Check them manually.");
    for (const repo of result.failed) {
      logWarn(`  ✗ ${repo}`);
    }
  }
}

/**
 * Watch every target in order. Failures are counted, never fatal; only a
 * missing `gh` session ends the run early.
 */
export function runBatch(targets: readonly RepoTarget[]): BatchResult {
  printBanner("🔔 GitHub watch setup for MCP server monitoring");
  requireGhAuth();

  const result: BatchResult = { total: targets.length, succeeded: [], failed: [] };
  for (const target of targets) {
    if (setupWatch(target)) {
      optimizeNotifications(target.name);
      result.succeeded.push(target.name);
    } else {
      result.failed.push(target.name);
    }
    console.log("");
  }

  printBatchSummary(result);
  return result;
}

// ── Add ──

export function addWatchForRepo(
  repo: string | undefined,
  description: string | undefined,
  options: AddOptions,
): void {
  if (!repo) {
    errorOut(`Usage: ${BIN_NAME} add <owner/repo> [description]`);
  }
  if (!validateRepoName(repo)) {
    errorOut(
      `Invalid repository "${repo}". Use owner/repo format (e.g., modelcontextprotocol/servers)`,
    );
  }

  const statusFile = options.resolveStatusFile();

  logInfo(`🔔 Setting up watch for new repository: ${repo}`);
  requireGhAuth();

  if (!setupWatch({ name: repo, description: description || DEFAULT_DESCRIPTION })) {
    errorOut(`❌ Failed to set up watch for ${repo}`);
  }

  optimizeNotifications(repo);
  logInfo(`✅ Watch setup complete for ${repo}`);

  if (appendStatusEntry(statusFile, repo)) {
    logInfo(`📝 Added to ${basename(statusFile)}`);
  }
}

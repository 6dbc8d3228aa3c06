import { isGhAuthenticated } from "./github.js";
import { errorOut, logInfo } from "./output.js";

/** Return only when `gh` holds a valid session; otherwise exit 1. */
export function requireGhAuth(): void {
  logInfo("Checking GitHub authentication...");
  if (!isGhAuthenticated()) {
    errorOut("GitHub authentication required. Run 'gh auth login' first.");
  }
  logInfo("GitHub authentication OK");
}

import { beforeEach, describe, expect, it, vi } from "vitest";

// Must mock node:child_process before importing github.ts, because every
// gh call goes through execFileSync.
vi.mock("node:child_process", () => ({
  execFileSync: vi.fn(),
}));

import { execFileSync } from "node:child_process";
import { isGhAuthenticated, repoWebUrl, setRepoSubscription } from "./github.js";

const mockExecFileSync = vi.mocked(execFileSync);

beforeEach(() => {
  vi.clearAllMocks();
});

// ---------------------------------------------------------------------------
// isGhAuthenticated
// ---------------------------------------------------------------------------
describe("isGhAuthenticated", () => {
  it("returns true when gh auth status succeeds", () => {
    mockExecFileSync.mockReturnValue("Logged in to github.com as octo\n");

    expect(isGhAuthenticated()).toBe(true);
    expect(mockExecFileSync).toHaveBeenCalledWith(
      "gh",
      ["auth", "status"],
      expect.objectContaining({ encoding: "utf-8", timeout: 30_000 }),
    );
  });

  it("returns false when gh auth status exits non-zero", () => {
    mockExecFileSync.mockImplementation(() => {
      throw new Error("You are not logged into any GitHub hosts");
    });

    expect(isGhAuthenticated()).toBe(false);
  });

  it("keeps gh's stderr off the terminal", () => {
    mockExecFileSync.mockReturnValue("");

    isGhAuthenticated();

    expect(mockExecFileSync).toHaveBeenCalledWith(
      "gh",
      expect.any(Array),
      expect.objectContaining({ stdio: ["ignore", "pipe", "pipe"] }),
    );
  });
});

// ---------------------------------------------------------------------------
// setRepoSubscription
// ---------------------------------------------------------------------------
describe("setRepoSubscription", () => {
  it("PUTs subscribed=true and ignored=false to the repo's subscription", () => {
    mockExecFileSync.mockReturnValue('{"subscribed":true,"ignored":false}');

    const ok = setRepoSubscription("modelcontextprotocol/servers");

    expect(ok).toBe(true);
    expect(mockExecFileSync).toHaveBeenCalledOnce();
    expect(mockExecFileSync).toHaveBeenCalledWith(
      "gh",
      [
        "api",
        "--method",
        "PUT",
        "repos/modelcontextprotocol/servers/subscription",
        "--field",
        "subscribed=true",
        "--field",
        "ignored=false",
      ],
      expect.objectContaining({ encoding: "utf-8" }),
    );
  });

  it("returns false when the request fails", () => {
    mockExecFileSync.mockImplementation(() => {
      throw new Error("gh: Not Found (HTTP 404)");
    });

    expect(setRepoSubscription("owner/missing")).toBe(false);
  });

  it("does not retry after a failure", () => {
    mockExecFileSync.mockImplementation(() => {
      throw new Error("gh: API rate limit exceeded (HTTP 403)");
    });

    setRepoSubscription("owner/repo");

    expect(mockExecFileSync).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// repoWebUrl
// ---------------------------------------------------------------------------
describe("repoWebUrl", () => {
  it("builds the github.com URL for a repo", () => {
    expect(repoWebUrl("brave/brave-search-mcp-server")).toBe(
      "https://github.com/brave/brave-search-mcp-server",
    );
  });
});

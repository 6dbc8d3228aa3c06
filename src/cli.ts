const major = Number(process.versions.node.split(".")[0]);
if (major < 20) {
  console.error(
    `mcp-watch requires Node.js >= 20 (current: ${process.version}). Install from https://nodejs.org/`,
  );
  process.exit(1);
}

import { createProgram } from "./program.js";

// -- Run --

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });

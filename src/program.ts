import { Command } from "commander";
import { loadConfig } from "./config.js";
import { logError } from "./output.js";
import { addWatchForRepo, BIN_NAME, runBatch } from "./watch.js";

const VERSION = "0.1.0";

// -- Typed option interfaces --

interface GlobalOptions {
  strict?: true;
}

// -- Helpers --

function runMain(opts: GlobalOptions): void {
  const cfg = loadConfig();
  const result = runBatch(cfg.repos);
  // Partial failure exits 0 unless --strict; scripts may depend on that.
  if (opts.strict && result.failed.length > 0) {
    process.exit(1);
  }
}

// -- Program --

export function createProgram(): Command {
  const program = new Command();

  program
    .name(BIN_NAME)
    .description("Watch the GitHub repositories of the MCP servers you depend on")
    .version(VERSION)
    .usage("[options] [command]")
    .showHelpAfterError(`Run '${BIN_NAME} help' for usage.`)
    .option("--strict", "Exit with status 1 when any repository fails in batch mode")
    .argument("[command]", "main (default), add, list or help")
    .addHelpText(
      "after",
      `
Examples:
  $ ${BIN_NAME}                                Watch every configured repository
  $ ${BIN_NAME} add owner/repo "Description"   Watch one more repository
  $ ${BIN_NAME} help                           Show this help`,
    )
    .action((command: string | undefined) => {
      if (!command) {
        runMain(program.opts<GlobalOptions>());
        return;
      }
      if (command === "help") {
        program.outputHelp();
        return;
      }
      logError(`Unknown command: ${command}`);
      console.log(`Run '${BIN_NAME} help' for usage.`);
      process.exit(1);
    });

  // -- Main --

  program
    .command("main")
    .description("Watch every configured repository")
    .action(() => {
      runMain(program.opts<GlobalOptions>());
    });

  // -- Add --

  program
    .command("add")
    .description("Watch one more repository and record it in the status file")
    .argument("[repo]", "Repository in owner/repo format")
    .argument("[description]", "Label shown while configuring")
    .action((repo: string | undefined, description: string | undefined) => {
      addWatchForRepo(repo, description, {
        resolveStatusFile: () => loadConfig().statusFile,
      });
    });

  // -- List --

  program
    .command("list")
    .description("List the repositories watched in batch mode")
    .action(() => {
      const cfg = loadConfig();
      for (const target of cfg.repos) {
        console.log(`  ${target.name}  ${target.description}`);
      }
      console.log(`  Status file: ${cfg.statusFile}`);
    });

  return program;
}

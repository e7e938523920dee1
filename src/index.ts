#!/usr/bin/env node
/**
 * forager – CLI
 * Commands: run (default) | history
 */

import { Option, program } from "commander";
import { RunController } from "./adapters/controllers/run.controller.js";
import { parseNumberOption } from "./adapters/validation.js";
import {
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_SOURCE,
  loadEnvironment,
} from "./infrastructure/utils/config.utils.js";

loadEnvironment();


// Stop between files on SIGINT/SIGTERM; the summary is still emitted.
const controller = new AbortController();
process.once("SIGINT", () => controller.abort());
process.once("SIGTERM", () => controller.abort());

const commands = new RunController();

program
  .name("forager")
  .description("Upload new files from a watched directory, each at most once");

program
  .command("run", { isDefault: true })
  .description("Scan the source directory and upload one batch of files")
  .option("--source <dir>", "Directory to watch", DEFAULT_SOURCE)
  .option("--glob <pattern>", "Base-name pattern, e.g. '*.{jpg,png}'")
  .option("-r, --recursive", "Walk subdirectories", false)
  .option(
    "--skip-last-file <n>",
    "Hold back the N newest files (may still be written)",
    parseNumberOption,
    1,
  )
  .addOption(
    new Option("--sort-key <key>", "Order of processing")
      .choices(["mtime", "name"])
      .default("mtime"),
  )
  .option(
    "--max-file-size <bytes>",
    "Skip (permanently) files larger than this; 0 disables",
    parseNumberOption,
    DEFAULT_MAX_FILE_SIZE,
  )
  .option("--num-files <n>", "Batch size; 0 uploads every eligible file", parseNumberOption, 10)
  .option("--sleep <seconds>", "Pause between files", parseNumberOption, 3)
  .option("--prefix <text>", "Prepended to the uploaded file name", "")
  .option("--suffix <text>", "Appended to the uploaded file name (before the extension)", "")
  .option("--dry-run", "Report what would be uploaded; the ledger is not touched", false)
  .option("--delete-files", "Delete each file once its upload is recorded", false)
  .option("--transfer-symlinks", "Include symbolic links", false)
  .option("--state-dir <dir>", "Ledger and metadata directory (default: <source>/.forager)")
  .option("--debug", "Verbose output", false)
  .action(async (opts: unknown) => {
    process.exitCode = await commands.run(opts, controller.signal);
  });

program
  .command("history")
  .description("Show recent runs")
  .option("--source <dir>", "Watched directory", DEFAULT_SOURCE)
  .option("--state-dir <dir>", "Ledger and metadata directory")
  .option("--limit <n>", "Number of runs to show", parseNumberOption, 20)
  .action(async (opts: unknown) => {
    process.exitCode = await commands.history(opts);
  });

await program.parseAsync(process.argv);

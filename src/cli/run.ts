import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { organizeExport, type OrganizeResult } from "../orchestration/organize.js";
import { errorMessage } from "../types/errors.js";
import type { Logger } from "../types/logger.js";
import { createConsoleLogger } from "./console-logger.js";

export const USAGE = `Usage: proton-organize <export_dir> [--debug] [--dry-run] [--output <dir>]

Copies every .eml of a Proton Mail export into organized_emails/<folder>/,
one folder per email.

Folder priority:
  1. User-created folders (complex ID, Type 3)
  2. System folders (numeric ID, Type 3)
  3. Tags as fallback (Type 1), reported as unusual unless "All Mail"
  4. Unknown labels, then "Unlabeled"

Options:
  --debug          Log decision details and every copy
  --dry-run        Show what would be created without copying anything
  --output <dir>   Write to <dir> instead of <export_dir>/organized_emails
  -h, --help       Show this help`;

function printSummary(result: OrganizeResult, print: (line: string) => void): void {
  const verb = result.dryRun ? "Would process" : "Processed";
  print(`\n${verb} ${result.processed} emails with ${result.errors} errors`);
  print(`${result.dryRun ? "Would organize emails in:" : "Organized emails are in:"} ${result.outputDir}`);
  print(`\n${result.dryRun ? "Would create" : "Created"} ${result.folders.length} folders:`);
  for (const folder of result.folders) {
    print(`  ${folder.name}: ${folder.count} emails`);
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      debug: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      output: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

export interface CliIo {
  /** Summary and usage output. */
  print: (line: string) => void;
  createLogger: (debug: boolean) => Logger;
}

const defaultIo: CliIo = {
  print: (line) => console.log(line),
  createLogger: (debug) => createConsoleLogger(debug),
};

/** Run the organizer for command-line arguments; returns the process exit code. */
export function runCli(argv: string[], io: CliIo = defaultIo): number {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    io.print(errorMessage(err));
    io.print(USAGE);
    return 1;
  }
  const { values, positionals } = parsed;

  if (values.help || positionals.length !== 1) {
    io.print(USAGE);
    return values.help ? 0 : 1;
  }

  const debug = values.debug ?? false;
  const dryRun = values["dry-run"] ?? false;
  const logger = io.createLogger(debug);
  const exportDir = resolve(positionals[0]);
  logger.info(`Organizing Proton Mail export in: ${exportDir}`);
  if (dryRun) logger.info("Dry run mode enabled - no files will be copied");

  try {
    const result = organizeExport(
      { exportDir, outputDir: values.output ? resolve(values.output) : undefined, dryRun, debug },
      logger
    );
    printSummary(result, io.print);
    return 0;
  } catch (err) {
    logger.error(errorMessage(err));
    return 1;
  }
}

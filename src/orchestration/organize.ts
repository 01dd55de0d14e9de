import { copyFileSync, constants, existsSync, mkdirSync, rmSync, statSync, utimesSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { loadOrganizerSettings } from "../config/loader.js";
import { findMetadataFiles } from "../export/discover.js";
import { readEmailLabelIds } from "../export/metadata.js";
import { emailFileFor, sanitizeFolderName, uniqueTargetPath } from "../export/paths.js";
import { isNumericLabelId, classifyLabels } from "../labels/classify.js";
import {
  readLabelDictionary,
  type LabelDictionary,
  type LoadedLabelDictionary,
} from "../labels/dictionary.js";
import { selectFolder, type FolderDecision } from "../labels/select.js";
import type { OrganizerSettings } from "../types/documents.js";
import { MalformedInputError, OrganizeError, errorMessage } from "../types/errors.js";
import type { Logger } from "../types/logger.js";

export interface OrganizeOptions {
  /** Directory holding labels.json, *.metadata.json and *.eml. */
  exportDir: string;
  /** Defaults to `<exportDir>/<outputDirName>`. */
  outputDir?: string;
  /** Plan folders and names without creating or copying anything. */
  dryRun?: boolean;
  /** Log every label mapping and every copy; turns off periodic progress lines. */
  debug?: boolean;
  /** Defaults to config/organizer.json. */
  settings?: OrganizerSettings;
}

export type EmailErrorType = "malformed_input" | "missing_email_file" | "copy_failed";

export type EmailOutcome =
  | { ok: true; file: string; folder: string; target: string; warning?: string }
  | { ok: false; file: string; error: string; errorType: EmailErrorType };

export type EmailFailure = Extract<EmailOutcome, { ok: false }>;

export interface EmailWarning {
  /** Metadata file name the warning belongs to. */
  file: string;
  message: string;
}

export interface FolderCount {
  name: string;
  count: number;
}

export interface OrganizeResult {
  outputDir: string;
  dryRun: boolean;
  /** Metadata documents found. */
  total: number;
  processed: number;
  errors: number;
  failures: EmailFailure[];
  warnings: EmailWarning[];
  /** Emails per destination folder, sorted by name. */
  folders: FolderCount[];
}

function describeLabel(id: string, kindCode: number, kind: string): string {
  const type = kind === "unknown" ? `type_${kindCode}` : kind;
  const origin = isNumericLabelId(id) ? "system" : "user-created";
  return `${type}, ${origin}`;
}

function loadDictionary(path: string, debug: boolean, logger: Logger): LabelDictionary {
  if (!existsSync(path)) {
    throw new OrganizeError(`${basename(path)} not found in ${dirname(path)}`);
  }
  let loaded: LoadedLabelDictionary;
  try {
    loaded = readLabelDictionary(path);
  } catch (err) {
    if (err instanceof MalformedInputError) throw new OrganizeError(err.message);
    throw err;
  }
  const { dictionary, skipped } = loaded;
  for (const { index, entry } of skipped) {
    logger.warn("Incomplete label entry skipped", { index, entry });
  }

  const records = [...dictionary.values()];
  logger.info(`Loaded ${dictionary.size} label mappings`, {
    folders: records.filter((r) => r.kind === "folder").length,
    tags: records.filter((r) => r.kind === "tag").length,
  });
  if (debug) {
    for (const record of records) {
      logger.debug(`${record.id} -> ${record.name} (${describeLabel(record.id, record.kindCode, record.kind)})`);
    }
  }
  return dictionary;
}

function prepareOutputDir(outputDir: string, dryRun: boolean, logger: Logger): void {
  if (dryRun) {
    logger.info("[DRY RUN] Would create output directory", { outputDir });
    return;
  }
  if (existsSync(outputDir)) {
    throw new OrganizeError(
      `Output directory '${outputDir}' already exists; remove or rename it so a previous run is not merged into`
    );
  }
  try {
    mkdirSync(outputDir, { recursive: true });
  } catch (err) {
    throw new OrganizeError(`Failed to create output directory ${outputDir}: ${errorMessage(err)}`);
  }
}

/** Classify and select for one email, logging the details a user may want when debugging a choice. */
function decideFolder(
  file: string,
  labelIds: Set<string>,
  dictionary: LabelDictionary,
  settings: OrganizerSettings,
  logger: Logger
): FolderDecision {
  const partition = classifyLabels(labelIds, dictionary);
  for (const label of partition.unrecognized) {
    if (label.reason === "missing") logger.debug("Unknown label ID", { file, labelId: label.id });
  }
  const decision = selectFolder(partition, settings.unlabeledFolder);
  if (decision.candidates > 1 && decision.source !== "tag") {
    logger.debug("Multiple candidate labels, choosing lexically first", {
      file,
      source: decision.source,
      candidates: decision.candidates,
      chosen: decision.folderName,
    });
  }
  return decision;
}

/** A copy whose timestamps cannot be set is removed again, so a failed email leaves nothing behind. */
function copyPreservingTimes(source: string, target: string): void {
  copyFileSync(source, target, constants.COPYFILE_EXCL);
  try {
    const { atime, mtime } = statSync(source);
    utimesSync(target, atime, mtime);
  } catch (err) {
    rmSync(target, { force: true });
    throw err;
  }
}

/**
 * Copy every email of an export into `<outputDir>/<folder>/`, one folder per
 * email. Run-level problems throw OrganizeError before anything is copied;
 * problems with a single email are collected in `failures` and the run goes on.
 */
export function organizeExport(options: OrganizeOptions, logger: Logger): OrganizeResult {
  const settings = options.settings ?? loadOrganizerSettings();
  const dryRun = options.dryRun ?? false;
  const debug = options.debug ?? false;
  const exportDir = options.exportDir;

  if (!existsSync(exportDir) || !statSync(exportDir).isDirectory()) {
    throw new OrganizeError(`Directory ${exportDir} does not exist`);
  }

  const dictionary = loadDictionary(join(exportDir, settings.labelsFileName), debug, logger);

  const outputDir = options.outputDir ?? join(exportDir, settings.outputDirName);
  prepareOutputDir(outputDir, dryRun, logger);

  const metadataFiles = findMetadataFiles(exportDir, settings.metadataSuffix);
  if (metadataFiles.length === 0) {
    throw new OrganizeError(`No email metadata files found (*${settings.metadataSuffix})`);
  }
  logger.info(`${dryRun ? "[DRY RUN] Analyzing" : "Processing"} ${metadataFiles.length} email files`);

  const failures: EmailFailure[] = [];
  const warnings: EmailWarning[] = [];
  const folderCounts = new Map<string, number>();
  const planned = new Set<string>();
  let processed = 0;

  const processOne = (metadataPath: string): EmailOutcome => {
    const file = basename(metadataPath);
    const emailPath = emailFileFor(metadataPath, settings.metadataSuffix, settings.emailExtension);
    if (!existsSync(emailPath)) {
      return {
        ok: false,
        file,
        error: `Email file not found (looking for ${basename(emailPath)})`,
        errorType: "missing_email_file",
      };
    }

    let labelIds: Set<string>;
    try {
      labelIds = readEmailLabelIds(metadataPath);
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err;
      return { ok: false, file, error: err.message, errorType: "malformed_input" };
    }

    const decision = decideFolder(file, labelIds, dictionary, settings, logger);
    const folder = sanitizeFolderName(decision.folderName);
    const targetDir = join(outputDir, folder);
    const target = uniqueTargetPath(targetDir, basename(emailPath), (p) => planned.has(p) || existsSync(p));

    if (dryRun) {
      logger.debug(`[DRY RUN] Would copy ${basename(emailPath)} -> ${folder}/${basename(target)}`);
    } else {
      try {
        mkdirSync(targetDir, { recursive: true });
        copyPreservingTimes(emailPath, target);
      } catch (err) {
        return {
          ok: false,
          file,
          error: `Error copying ${basename(emailPath)} to ${folder}: ${errorMessage(err)}`,
          errorType: "copy_failed",
        };
      }
      logger.debug(`Copied ${basename(emailPath)} -> ${folder}/${basename(target)}`);
    }
    planned.add(target);
    return { ok: true, file, folder, target, warning: decision.warning };
  };

  for (const metadataPath of metadataFiles) {
    const outcome = processOne(metadataPath);
    if (!outcome.ok) {
      failures.push(outcome);
      logger.warn(outcome.error, { file: outcome.file, errorType: outcome.errorType });
      continue;
    }

    if (outcome.warning) {
      warnings.push({ file: outcome.file, message: outcome.warning });
      logger.warn(outcome.warning, { file: outcome.file });
    }
    folderCounts.set(outcome.folder, (folderCounts.get(outcome.folder) ?? 0) + 1);
    processed += 1;

    if (!debug && processed % settings.progressInterval === 0) {
      logger.info(`Processed ${processed}/${metadataFiles.length} emails`);
    }
  }

  const folders = [...folderCounts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  logger.info(dryRun ? "Analysis completed" : "Completed", {
    processed,
    errors: failures.length,
    outputDir,
  });

  return {
    outputDir,
    dryRun,
    total: metadataFiles.length,
    processed,
    errors: failures.length,
    failures,
    warnings,
    folders,
  };
}

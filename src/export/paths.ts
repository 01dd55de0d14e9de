import { basename, dirname, extname, join } from "node:path";

const UNSAFE_PATH_CHARS = /[<>:"/\\|?*]/g;
const EDGE_DOTS_AND_SPACES = /^[. ]+|[. ]+$/g;

/** Make a label name usable as a single directory name on any common filesystem. */
export function sanitizeFolderName(name: string): string {
  const cleaned = name.replace(UNSAFE_PATH_CHARS, "_").replace(EDGE_DOTS_AND_SPACES, "");
  return cleaned || "Unknown";
}

/** `/x/abc.metadata.json` -> `/x/abc.eml` */
export function emailFileFor(metadataPath: string, metadataSuffix: string, emailExtension: string): string {
  const name = basename(metadataPath);
  const base = name.endsWith(metadataSuffix) ? name.slice(0, -metadataSuffix.length) : name;
  return join(dirname(metadataPath), `${base}${emailExtension}`);
}

/**
 * First free path for `fileName` inside `targetDir`: the name itself, then
 * `<stem>_1<ext>`, `<stem>_2<ext>`, ...
 */
export function uniqueTargetPath(
  targetDir: string,
  fileName: string,
  isTaken: (path: string) => boolean
): string {
  let candidate = join(targetDir, fileName);
  const ext = extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  for (let counter = 1; isTaken(candidate); counter++) {
    candidate = join(targetDir, `${stem}_${counter}${ext}`);
  }
  return candidate;
}

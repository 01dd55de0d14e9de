import { readdirSync } from "node:fs";
import { join } from "node:path";

/** Metadata documents directly inside the export dir, in file-name order. */
export function findMetadataFiles(exportDir: string, metadataSuffix: string): string[] {
  return readdirSync(exportDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(metadataSuffix))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(exportDir, name));
}

/** `labels.json` at the root of an export: `{ "Version": 1, "Payload": [...] }`. */
export interface LabelDefinitionsDocument {
  Version?: number;
  /** Entries are validated one by one; incomplete ones are skipped, not fatal. */
  Payload: unknown[];
}

/** One complete entry of `labels.json` Payload. */
export interface LabelEntry {
  ID: string;
  Name: string;
  /** 1 = tag, 3 = folder; other codes are kept as an unknown kind. */
  Type: number;
}

/**
 * A `<base>.metadata.json` document. Either `{ Payload: { LabelIDs } }` or the
 * older top-level `{ LabelIDs }`; the schema guarantees one of them is present.
 */
export type EmailMetadataDocument = Record<string, unknown>;

export interface OrganizerSettings {
  outputDirName: string;
  labelsFileName: string;
  metadataSuffix: string;
  emailExtension: string;
  progressInterval: number;
  unlabeledFolder: string;
}

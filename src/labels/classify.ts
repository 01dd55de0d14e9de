import type { LabelDictionary } from "./dictionary.js";

export interface ResolvedLabel {
  id: string;
  name: string;
}

export type UnrecognizedLabel =
  | { id: string; reason: "missing" }
  | { id: string; reason: "unknown_kind"; name: string; kindCode: number };

/**
 * One email's labels split five ways. Every id of the input lands in exactly
 * one list.
 */
export interface CategoryPartition {
  /** Folder kind, complex id. */
  userFolders: ResolvedLabel[];
  /** Folder kind, numeric id. */
  systemFolders: ResolvedLabel[];
  /** Tag kind, complex id. */
  userTags: ResolvedLabel[];
  /** Tag kind, numeric id. */
  systemTags: ResolvedLabel[];
  unrecognized: UnrecognizedLabel[];
}

const NUMERIC_ID = /^[0-9]+$/;

/** System labels carry short numeric ids; user-created ones carry opaque encoded strings. */
export function isNumericLabelId(labelId: string): boolean {
  return NUMERIC_ID.test(labelId);
}

export function emptyPartition(): CategoryPartition {
  return { userFolders: [], systemFolders: [], userTags: [], systemTags: [], unrecognized: [] };
}

/** Partition an email's label ids by id shape and dictionary kind. Pure. */
export function classifyLabels(
  labelIds: Iterable<string>,
  dictionary: LabelDictionary
): CategoryPartition {
  const partition = emptyPartition();
  for (const id of new Set(labelIds)) {
    const record = dictionary.get(id);
    if (!record) {
      partition.unrecognized.push({ id, reason: "missing" });
      continue;
    }
    const label: ResolvedLabel = { id, name: record.name };
    const numeric = isNumericLabelId(id);
    switch (record.kind) {
      case "folder":
        (numeric ? partition.systemFolders : partition.userFolders).push(label);
        break;
      case "tag":
        (numeric ? partition.systemTags : partition.userTags).push(label);
        break;
      case "unknown":
        partition.unrecognized.push({
          id,
          reason: "unknown_kind",
          name: record.name,
          kindCode: record.kindCode,
        });
        break;
    }
  }
  return partition;
}

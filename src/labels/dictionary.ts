import {
  labelDefinitionsValidator,
  labelEntryValidator,
  readJsonFile,
  validateDocument,
} from "../config/loader.js";
import { MalformedInputError } from "../types/errors.js";

export const LABEL_TYPE_TAG = 1;
export const LABEL_TYPE_FOLDER = 3;

export type LabelKind = "tag" | "folder" | "unknown";

export interface LabelRecord {
  id: string;
  name: string;
  kind: LabelKind;
  /** Raw `Type` from labels.json; the only way to tell unknown kinds apart. */
  kindCode: number;
}

/** Built once per run; never mutated afterwards. */
export type LabelDictionary = ReadonlyMap<string, LabelRecord>;

export interface LoadedLabelDictionary {
  dictionary: LabelDictionary;
  /** Payload entries that were missing ID, Name or Type, with their position. */
  skipped: Array<{ index: number; entry: unknown }>;
}

export function kindFromCode(code: number): LabelKind {
  if (code === LABEL_TYPE_TAG) return "tag";
  if (code === LABEL_TYPE_FOLDER) return "folder";
  return "unknown";
}

/**
 * Build the label dictionary from a parsed labels.json document.
 * Incomplete entries are skipped and reported; a later entry with the same ID
 * replaces an earlier one. Throws MalformedInputError when the top-level shape
 * is wrong or nothing usable remains.
 */
export function loadLabelDictionary(
  document: unknown,
  source = "labels.json"
): LoadedLabelDictionary {
  const { Payload } = validateDocument(labelDefinitionsValidator, document, source);
  const validateEntry = labelEntryValidator();

  const dictionary = new Map<string, LabelRecord>();
  const skipped: LoadedLabelDictionary["skipped"] = [];
  Payload.forEach((entry, index) => {
    if (!validateEntry(entry)) {
      skipped.push({ index, entry });
      return;
    }
    dictionary.set(entry.ID, {
      id: entry.ID,
      name: entry.Name,
      kind: kindFromCode(entry.Type),
      kindCode: entry.Type,
    });
  });

  if (dictionary.size === 0) {
    throw new MalformedInputError(source, "no valid label mappings found");
  }
  return { dictionary, skipped };
}

/** Read labels.json from disk and build the dictionary. */
export function readLabelDictionary(path: string): LoadedLabelDictionary {
  return loadLabelDictionary(readJsonFile(path), path);
}

import { emailMetadataValidator, readJsonFile, validateDocument } from "../config/loader.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asLabelIdList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const ids: string[] = [];
  for (const item of value) {
    if (typeof item === "string") ids.push(item);
    else if (typeof item === "number") ids.push(String(item));
    else return null;
  }
  return ids;
}

/**
 * Pull the label ids out of a metadata document. Newer exports nest them as
 * `Payload.LabelIDs`, older ones keep `LabelIDs` at the top; Payload wins when
 * both are present. Numeric ids are stringified.
 */
export function extractLabelIds(document: unknown, source = "metadata"): Set<string> {
  const doc = validateDocument(emailMetadataValidator, document, source);
  const payload = doc.Payload;
  const nested = isRecord(payload) ? asLabelIdList(payload.LabelIDs) : null;
  // the schema guarantees one of the two lists is well-formed
  return new Set(nested ?? asLabelIdList(doc.LabelIDs) ?? []);
}

/** Read `<base>.metadata.json` and return its label ids. Throws MalformedInputError. */
export function readEmailLabelIds(path: string): Set<string> {
  return extractLabelIds(readJsonFile(path), path);
}

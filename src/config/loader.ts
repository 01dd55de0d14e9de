import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import { MalformedInputError, errorMessage } from "../types/errors.js";
import type {
  EmailMetadataDocument,
  LabelDefinitionsDocument,
  LabelEntry,
  OrganizerSettings,
} from "../types/documents.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const ROOT_FROM_DIRNAME = join(__dirname, "..", "..");

/** Project root: from src/config or dist/config (local), or process.cwd() when deployed with config/ at cwd. */
function getRoot(): string {
  const fromDir = ROOT_FROM_DIRNAME;
  if (existsSync(join(fromDir, "config", "organizer.json"))) return fromDir;
  const cwd = process.cwd();
  if (existsSync(join(cwd, "config", "organizer.json"))) return cwd;
  return fromDir;
}
const ROOT = getRoot();

const configDir = (usePrivate: boolean) =>
  usePrivate ? join(ROOT, "private", "config") : join(ROOT, "config");

/**
 * Read and parse a JSON file. Missing, unreadable and unparsable files all
 * surface as MalformedInputError tagged with the path.
 */
export function readJsonFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (e: unknown) {
    throw new MalformedInputError(path, `cannot read file (${errorMessage(e)})`);
  }
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    throw new MalformedInputError(path, `invalid JSON (${errorMessage(e)})`);
  }
}

// ESM default import of a CJS package is the module object; the Ajv class sits at .default
const Ajv = AjvModule.default;
const ajv = new Ajv({ strict: false, allErrors: true });

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadSchema(schemaName: string): SchemaObject {
  const path = join(ROOT, "schemas", schemaName);
  if (!existsSync(path)) throw new Error(`Schema not found: ${schemaName}`);
  const schema = readJsonFile(path);
  if (!isSchemaObject(schema)) throw new Error(`Schema ${schemaName} is not a JSON object`);
  return schema;
}

/** Compile on first use and keep the validator for the rest of the process. */
function lazyValidator<T>(schemaName: string): () => ValidateFunction<T> {
  let compiled: ValidateFunction<T> | null = null;
  return () => {
    if (!compiled) compiled = ajv.compile<T>(loadSchema(schemaName));
    return compiled;
  };
}

export const labelDefinitionsValidator = lazyValidator<LabelDefinitionsDocument>("labels.json");
export const labelEntryValidator = lazyValidator<LabelEntry>("label_entry.json");
export const emailMetadataValidator = lazyValidator<EmailMetadataDocument>("email_metadata.json");
const organizerSettingsValidator = lazyValidator<OrganizerSettings>("organizer.json");

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return errors?.map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`).join("; ") ?? "unknown error";
}

/** Validate a parsed document against its schema. Throws MalformedInputError listing every violation. */
export function validateDocument<T>(
  validator: () => ValidateFunction<T>,
  data: unknown,
  source: string
): T {
  const validate = validator();
  if (validate(data)) return data;
  throw new MalformedInputError(source, `unexpected structure: ${formatSchemaErrors(validate.errors)}`);
}

/** Load organizer settings with precedence: private/config > config/. */
export function loadOrganizerSettings(): OrganizerSettings {
  const privatePath = join(configDir(true), "organizer.json");
  const defaultPath = join(configDir(false), "organizer.json");
  const path = existsSync(privatePath) ? privatePath : defaultPath;
  if (!existsSync(path)) {
    throw new Error("Config file not found: organizer.json (checked private/config and config/)");
  }
  const data = readJsonFile(path);
  const validate = organizerSettingsValidator();
  if (!validate(data)) {
    throw new Error(`Config validation failed for organizer.json: ${formatSchemaErrors(validate.errors)}`);
  }
  return data;
}

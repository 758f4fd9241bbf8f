import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { computeMappingHash, HASH_ALGORITHM, isValidHash, splitHashPath } from "./content-hash.js";
import { isValidLanguageCode } from "./language-codes.js";
import { describeError, InvalidInputError, NotFoundError, SchemaError } from "./pool-errors.js";
import {
  CURRENT_SCHEMA_VERSION,
  type CanonicalFunctionRecord,
  type FunctionMetadata,
  type LocalizationMapping,
  type MappingContent,
  type MappingFile,
  type MappingSelection,
  type MappingSummary,
  type ObjectFile,
  type PoolDiagnostic,
  type PoolValidationResult,
  type SchemaGeneration,
} from "./pool-types.js";

const OBJECT_FILE = "object.json";
const MAPPING_FILE = "mapping.json";
const LEGACY_SUFFIX = ".json";
const PREFIX_PATTERN = /^[0-9a-f]{2}$/;

export interface SaveResult {
  path: string;
  created: boolean;
}

export interface SaveMappingResult extends SaveResult {
  mappingHash: string;
}

/**
 * Content-addressed pool layout:
 *
 *   <root>/sha256/<h[0:2]>/<h[2:]>/object.json
 *   <root>/sha256/<h[0:2]>/<h[2:]>/<lang>/sha256/<m[0:2]>/<m[2:]>/mapping.json
 *   <root>/<h[0:2]>/<h[2:]>.json                    (schema 0, read-only)
 */
export class PoolStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  functionDirectory(hash: string): string {
    const [prefix, rest] = splitHashPath(requireHash(hash));
    return path.join(this.root, HASH_ALGORITHM, prefix, rest);
  }

  objectPath(hash: string): string {
    return path.join(this.functionDirectory(hash), OBJECT_FILE);
  }

  languageDirectory(hash: string, language: string): string {
    return path.join(this.functionDirectory(hash), requireLanguage(language));
  }

  mappingPath(hash: string, language: string, mappingHash: string): string {
    const [prefix, rest] = splitHashPath(requireHash(mappingHash, "mappingHash"));
    return path.join(this.languageDirectory(hash, language), HASH_ALGORITHM, prefix, rest, MAPPING_FILE);
  }

  legacyPath(hash: string): string {
    const [prefix, rest] = splitHashPath(requireHash(hash));
    return path.join(this.root, prefix, `${rest}${LEGACY_SUFFIX}`);
  }

  async detectVersion(hash: string): Promise<SchemaGeneration> {
    if (await pathExists(this.objectPath(hash))) {
      return "current";
    }
    if (await this.hasLegacy(hash)) {
      return "legacy";
    }
    return "not_found";
  }

  async hasFunction(hash: string): Promise<boolean> {
    return pathExists(this.objectPath(hash));
  }

  async hasLegacy(hash: string): Promise<boolean> {
    return pathExists(this.legacyPath(hash));
  }

  async saveObject(hash: string, normalizedCode: string, metadata: FunctionMetadata): Promise<SaveResult> {
    const target = this.objectPath(hash);
    const record: ObjectFile = {
      schema_version: CURRENT_SCHEMA_VERSION,
      hash,
      hash_algorithm: HASH_ALGORITHM,
      normalized_code: normalizedCode,
      encoding: "none",
      metadata: cloneMetadata(metadata),
    };
    return { path: target, created: await writeJsonIfAbsent(target, record) };
  }

  async saveMapping(hash: string, language: string, content: MappingContent): Promise<SaveMappingResult> {
    const record = toMappingFile(content);
    const mappingHash = computeMappingHash(record);
    const target = this.mappingPath(hash, language, mappingHash);
    return { mappingHash, path: target, created: await writeJsonIfAbsent(target, record) };
  }

  async loadObject(hash: string): Promise<CanonicalFunctionRecord> {
    const target = this.objectPath(hash);
    if (!(await pathExists(target))) {
      throw new NotFoundError("function", hash);
    }
    const raw = await readJson(target);
    const violations = checkObjectFile(raw, hash);
    if (violations.length > 0 || !isObjectFile(raw)) {
      throw new SchemaError(target, violations);
    }
    return {
      hash: raw.hash,
      schemaVersion: raw.schema_version,
      normalizedCode: raw.normalized_code,
      metadata: cloneMetadata(raw.metadata),
    };
  }

  async listLanguages(hash: string): Promise<string[]> {
    const entries = await readDirectory(this.functionDirectory(hash));
    return entries
      .filter((entry) => entry.isDirectory() && isValidLanguageCode(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  async listMappingHashes(hash: string, language: string): Promise<string[]> {
    const base = path.join(this.languageDirectory(hash, language), HASH_ALGORITHM);
    const hashes: string[] = [];
    for (const prefix of await readDirectory(base)) {
      if (!prefix.isDirectory() || !PREFIX_PATTERN.test(prefix.name)) {
        continue;
      }
      for (const rest of await readDirectory(path.join(base, prefix.name))) {
        const mappingHash = `${prefix.name}${rest.name}`;
        if (rest.isDirectory() && isValidHash(mappingHash) && (await pathExists(path.join(base, prefix.name, rest.name, MAPPING_FILE)))) {
          hashes.push(mappingHash);
        }
      }
    }
    return hashes.sort();
  }

  async listMappings(hash: string, language: string): Promise<MappingSummary[]> {
    const summaries: MappingSummary[] = [];
    for (const mappingHash of await this.listMappingHashes(hash, language)) {
      const mapping = await this.readMapping(hash, language, mappingHash);
      summaries.push({ mappingHash, comment: mapping.comment });
    }
    return summaries;
  }

  async readMapping(hash: string, language: string, mappingHash: string): Promise<LocalizationMapping> {
    const target = this.mappingPath(hash, language, mappingHash);
    if (!(await pathExists(target))) {
      throw new NotFoundError("mapping", `${hash}/${language}/${mappingHash}`);
    }
    const raw = await readJson(target);
    const violations = checkMappingFile(raw);
    if (violations.length > 0 || !isMappingFile(raw)) {
      throw new SchemaError(target, violations);
    }
    return {
      hash,
      language,
      mappingHash,
      docstring: raw.docstring,
      nameMapping: { ...raw.name_mapping },
      aliasMapping: { ...raw.alias_mapping },
      comment: raw.comment,
    };
  }

  async loadMapping(hash: string, language: string, mappingHash?: string): Promise<MappingSelection> {
    if (mappingHash !== undefined) {
      if (!(await pathExists(this.mappingPath(hash, language, mappingHash)))) {
        return { status: "not_found", hash, language, reason: "mapping" };
      }
      return { status: "selected", mapping: await this.readMapping(hash, language, mappingHash) };
    }

    const summaries = await this.listMappings(hash, language);
    if (summaries.length === 0) {
      return { status: "not_found", hash, language, reason: "language" };
    }
    if (summaries.length > 1) {
      return { status: "ambiguous", hash, language, candidates: summaries };
    }
    return { status: "selected", mapping: await this.readMapping(hash, language, summaries[0].mappingHash) };
  }

  async validate(hash: string): Promise<PoolValidationResult> {
    const errors: PoolDiagnostic[] = [];
    const target = this.objectPath(hash);

    if (!(await pathExists(target))) {
      errors.push(diagnostic("object_missing", `No ${OBJECT_FILE} for ${hash}.`, { path: target }));
      return { ok: false, hash, errors };
    }

    let raw: unknown;
    try {
      raw = await readJson(target);
    } catch (error) {
      errors.push(diagnostic("object_unreadable", `${OBJECT_FILE} is not readable JSON: ${describeError(error)}`, { path: target }));
      return { ok: false, hash, errors };
    }

    for (const violation of checkObjectFile(raw, hash)) {
      errors.push(diagnosticForViolation(violation));
    }

    const languages = await this.listLanguages(hash);
    if (languages.length === 0) {
      errors.push(diagnostic("no_languages", `Function ${hash} has no language mappings.`));
    }

    for (const language of languages) {
      const mappingHashes = await this.listMappingHashes(hash, language);
      if (mappingHashes.length === 0) {
        errors.push(diagnostic("no_mappings", `Language '${language}' has no mappings.`, { language }));
      }
      for (const mappingHash of mappingHashes) {
        const mappingPath = this.mappingPath(hash, language, mappingHash);
        let mapping: unknown;
        try {
          mapping = await readJson(mappingPath);
        } catch (error) {
          errors.push(
            diagnostic("mapping_unreadable", `Mapping ${mappingHash} is not readable JSON: ${describeError(error)}`, {
              language,
              mappingHash,
            }),
          );
          continue;
        }
        for (const violation of checkMappingFile(mapping)) {
          errors.push(diagnostic("mapping_invalid", `Mapping ${mappingHash} (${language}): ${violation}`, { language, mappingHash }));
        }
      }
    }

    return { ok: errors.length === 0, hash, errors };
  }

  async listFunctionHashes(): Promise<string[]> {
    const base = path.join(this.root, HASH_ALGORITHM);
    const hashes: string[] = [];
    for (const prefix of await readDirectory(base)) {
      if (!prefix.isDirectory() || !PREFIX_PATTERN.test(prefix.name)) {
        continue;
      }
      for (const rest of await readDirectory(path.join(base, prefix.name))) {
        const hash = `${prefix.name}${rest.name}`;
        if (rest.isDirectory() && isValidHash(hash) && (await pathExists(path.join(base, prefix.name, rest.name, OBJECT_FILE)))) {
          hashes.push(hash);
        }
      }
    }
    return hashes.sort();
  }

  async listLegacyHashes(): Promise<string[]> {
    const hashes: string[] = [];
    for (const prefix of await readDirectory(this.root)) {
      if (!prefix.isDirectory() || !PREFIX_PATTERN.test(prefix.name)) {
        continue;
      }
      for (const entry of await readDirectory(path.join(this.root, prefix.name))) {
        if (!entry.isFile() || !entry.name.endsWith(LEGACY_SUFFIX)) {
          continue;
        }
        const hash = `${prefix.name}${entry.name.slice(0, -LEGACY_SUFFIX.length)}`;
        if (isValidHash(hash)) {
          hashes.push(hash);
        }
      }
    }
    return hashes.sort();
  }

  async readLegacyJson(hash: string): Promise<unknown> {
    const target = this.legacyPath(hash);
    if (!(await pathExists(target))) {
      throw new NotFoundError("function", hash);
    }
    return readJson(target);
  }

  async discardFunction(hash: string): Promise<void> {
    await fs.rm(this.functionDirectory(hash), { recursive: true, force: true });
  }

  async removeLegacy(hash: string): Promise<void> {
    const target = this.legacyPath(hash);
    await fs.rm(target, { force: true });
    const directory = path.dirname(target);
    if ((await pathExists(directory)) && (await readDirectory(directory)).length === 0) {
      await fs.rmdir(directory);
    }
  }
}

export function checkObjectFile(raw: unknown, expectedHash: string): string[] {
  if (!isRecord(raw)) {
    return ["object must be a JSON object"];
  }
  const violations: string[] = [];
  if (raw.schema_version === undefined) {
    violations.push("missing field 'schema_version'");
  } else if (raw.schema_version !== CURRENT_SCHEMA_VERSION) {
    violations.push(`schema_version must be ${CURRENT_SCHEMA_VERSION}, found ${JSON.stringify(raw.schema_version)}`);
  }
  if (raw.hash === undefined) {
    violations.push("missing field 'hash'");
  } else if (raw.hash !== expectedHash) {
    violations.push(`hash field ${JSON.stringify(raw.hash)} does not match directory hash ${expectedHash}`);
  }
  if (raw.hash_algorithm === undefined) {
    violations.push("missing field 'hash_algorithm'");
  } else if (raw.hash_algorithm !== HASH_ALGORITHM) {
    violations.push(`hash_algorithm must be '${HASH_ALGORITHM}'`);
  }
  if (raw.normalized_code === undefined) {
    violations.push("missing field 'normalized_code'");
  } else if (typeof raw.normalized_code !== "string" || raw.normalized_code.length === 0) {
    violations.push("normalized_code must be a non-empty string");
  }
  if (raw.encoding === undefined) {
    violations.push("missing field 'encoding'");
  } else if (raw.encoding !== "none") {
    violations.push("encoding must be 'none'");
  }
  if (raw.metadata === undefined) {
    violations.push("missing field 'metadata'");
  } else {
    violations.push(...checkMetadata(raw.metadata));
  }
  return violations;
}

export function checkMappingFile(raw: unknown): string[] {
  if (!isRecord(raw)) {
    return ["mapping must be a JSON object"];
  }
  const violations: string[] = [];
  if (typeof raw.docstring !== "string") {
    violations.push("docstring must be a string");
  }
  if (!isStringRecord(raw.name_mapping)) {
    violations.push("name_mapping must map strings to strings");
  }
  if (!isStringRecord(raw.alias_mapping)) {
    violations.push("alias_mapping must map strings to strings");
  }
  if (typeof raw.comment !== "string") {
    violations.push("comment must be a string");
  }
  return violations;
}

export function toMappingFile(content: MappingContent): MappingFile {
  return {
    docstring: content.docstring,
    name_mapping: { ...content.nameMapping },
    alias_mapping: { ...content.aliasMapping },
    comment: content.comment,
  };
}

export function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((entry) => typeof entry === "string");
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkMetadata(value: unknown): string[] {
  if (!isRecord(value)) {
    return ["metadata must be an object"];
  }
  const violations: string[] = [];
  if (typeof value.created !== "string" || value.created.length === 0) {
    violations.push("metadata.created must be a non-empty string");
  }
  for (const field of ["name", "email", "parent"] as const) {
    if (value[field] !== undefined && typeof value[field] !== "string") {
      violations.push(`metadata.${field} must be a string`);
    }
  }
  if (value.parent !== undefined && !isValidHash(value.parent)) {
    violations.push("metadata.parent must be a function hash");
  }
  if (value.checks !== undefined && (!Array.isArray(value.checks) || !value.checks.every((entry) => isValidHash(entry)))) {
    violations.push("metadata.checks must be a list of function hashes");
  }
  return violations;
}

function isObjectFile(raw: unknown): raw is ObjectFile {
  return (
    isRecord(raw) &&
    raw.schema_version === CURRENT_SCHEMA_VERSION &&
    typeof raw.hash === "string" &&
    typeof raw.normalized_code === "string" &&
    isRecord(raw.metadata) &&
    typeof raw.metadata.created === "string"
  );
}

function isMappingFile(raw: unknown): raw is MappingFile {
  return checkMappingFile(raw).length === 0;
}

function cloneMetadata(metadata: FunctionMetadata): FunctionMetadata {
  const clone: FunctionMetadata = { created: metadata.created };
  if (metadata.name !== undefined) {
    clone.name = metadata.name;
  }
  if (metadata.email !== undefined) {
    clone.email = metadata.email;
  }
  if (metadata.parent !== undefined) {
    clone.parent = metadata.parent;
  }
  if (metadata.checks !== undefined && metadata.checks.length > 0) {
    clone.checks = metadata.checks.slice();
  }
  return clone;
}

function diagnostic(
  code: PoolDiagnostic["code"],
  message: string,
  details?: Record<string, unknown>,
): PoolDiagnostic {
  return details ? { code, severity: "error", message, details } : { code, severity: "error", message };
}

function diagnosticForViolation(violation: string): PoolDiagnostic {
  if (violation.startsWith("missing field")) {
    return diagnostic("missing_field", violation);
  }
  if (violation.startsWith("schema_version")) {
    return diagnostic("schema_version_mismatch", violation);
  }
  if (violation.startsWith("hash field")) {
    return diagnostic("hash_mismatch", violation);
  }
  return diagnostic("invalid_field", violation);
}

// Writes through a temporary file and a hard link so readers never see a partial file
// and an existing file is left untouched.
async function writeJsonIfAbsent(target: string, value: unknown): Promise<boolean> {
  if (await pathExists(target)) {
    return false;
  }
  await fs.mkdir(path.dirname(target), { recursive: true });
  const temporary = `${target}.${process.pid}.${randomUUID()}.tmp`;
  await fs.writeFile(temporary, `${JSON.stringify(value, null, 2)}\n`, "utf8");
  try {
    await fs.link(temporary, target);
    return true;
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  } finally {
    await fs.rm(temporary, { force: true });
  }
}

async function readJson(target: string): Promise<unknown> {
  const content = await fs.readFile(target, "utf8");
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

async function readDirectory(directory: string) {
  try {
    return await fs.readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function requireHash(value: string, field = "hash"): string {
  if (!isValidHash(value)) {
    throw new InvalidInputError(field, `'${value}' is not a 64-character lowercase hex sha256 digest`);
  }
  return value;
}

export function requireLanguage(value: string): string {
  if (!isValidLanguageCode(value)) {
    throw new InvalidInputError("language", `'${value}' is not a valid language code`);
  }
  return value;
}

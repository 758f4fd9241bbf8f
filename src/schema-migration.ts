import { computeMappingHash } from "./content-hash.js";
import { reformatTemplate } from "./denormalizer.js";
import { isValidLanguageCode } from "./language-codes.js";
import { createSilentLogger, type Logger } from "./logger.js";
import { describeError, NotFoundError, SchemaError } from "./pool-errors.js";
import { POOL_IMPORT_PREFIX, POOL_MODULE } from "./pool-references.js";
import { isRecord, isStringRecord, type PoolStorage, toMappingFile } from "./pool-storage.js";
import {
  LEGACY_SCHEMA_VERSION,
  type CanonicalFunctionRecord,
  type FunctionMetadata,
  type MappingContent,
} from "./pool-types.js";

export interface LegacyLocalization {
  docstring: string;
  nameMapping: Record<string, string>;
  aliasMapping: Record<string, string>;
}

export interface LegacyMetadata {
  created?: string;
  author?: string;
}

export interface LegacyFunctionRecord {
  generation: "legacy";
  hash: string;
  normalizedCode: string;
  metadata: LegacyMetadata;
  localizations: Record<string, LegacyLocalization>;
}

export interface CurrentFunctionRecord {
  generation: "current";
  record: CanonicalFunctionRecord;
}

export type StoredFunctionRecord = LegacyFunctionRecord | CurrentFunctionRecord;

export interface ConvertedFunction {
  hash: string;
  normalizedCode: string;
  metadata: FunctionMetadata;
  mappings: Array<{ language: string; content: MappingContent }>;
}

export type MigrationStatus = "migrated" | "planned" | "skipped" | "failed";

export interface MigrationOutcome {
  hash: string;
  status: MigrationStatus;
  languages: string[];
  mappingHashes: string[];
  errors: string[];
}

export interface MigrationReport {
  outcomes: MigrationOutcome[];
  migrated: number;
  planned: number;
  skipped: number;
  failed: number;
}

export interface MigrationOptions {
  metadata: FunctionMetadata;
  keepLegacy?: boolean;
  dryRun?: boolean;
  logger?: Logger;
}

const BARE_HASH = /(^|[^\w$])([0-9a-f]{64})(?![\w$])/g;
const BARE_RECEIVER = /(^|[^\w$.])([0-9a-f]{64})(?=\s*\.)/g;
const POOL_IMPORT_STATEMENT = new RegExp(
  String.raw`import\s*\{([^}]*)\}\s*from\s*(["'])${escapeRegExp(POOL_MODULE)}\2`,
  "g",
);

export async function readStoredFunction(storage: PoolStorage, hash: string): Promise<StoredFunctionRecord> {
  const generation = await storage.detectVersion(hash);
  if (generation === "current") {
    return { generation, record: await storage.loadObject(hash) };
  }
  if (generation === "legacy") {
    return parseLegacyRecord(await storage.readLegacyJson(hash), hash, storage.legacyPath(hash));
  }
  throw new NotFoundError("function", hash);
}

export function parseLegacyRecord(raw: unknown, hash: string, subject = hash): LegacyFunctionRecord {
  if (!isRecord(raw)) {
    throw new SchemaError(subject, ["legacy record must be a JSON object"]);
  }

  const violations: string[] = [];
  if (raw.version !== undefined && raw.version !== LEGACY_SCHEMA_VERSION) {
    violations.push(`version must be ${LEGACY_SCHEMA_VERSION}, found ${JSON.stringify(raw.version)}`);
  }
  if (raw.hash !== undefined && raw.hash !== hash) {
    violations.push(`hash field ${JSON.stringify(raw.hash)} does not match file hash ${hash}`);
  }
  if (typeof raw.normalized_code !== "string" || raw.normalized_code.length === 0) {
    violations.push("normalized_code must be a non-empty string");
  }

  const docstrings = raw.docstrings ?? {};
  const nameMappings = raw.name_mappings ?? {};
  const aliasMappings = raw.alias_mappings ?? {};
  if (!isStringRecord(docstrings)) {
    violations.push("docstrings must map languages to strings");
  }
  if (!isRecord(nameMappings) || !Object.values(nameMappings).every((entry) => isStringRecord(entry))) {
    violations.push("name_mappings must map languages to string maps");
  }
  if (!isRecord(aliasMappings) || !Object.values(aliasMappings).every((entry) => isStringRecord(entry))) {
    violations.push("alias_mappings must map languages to string maps");
  }

  const metadata: LegacyMetadata = {};
  if (raw.metadata !== undefined) {
    if (!isRecord(raw.metadata)) {
      violations.push("metadata must be an object");
    } else {
      if (typeof raw.metadata.created === "string") {
        metadata.created = raw.metadata.created;
      }
      if (typeof raw.metadata.author === "string") {
        metadata.author = raw.metadata.author;
      }
    }
  }

  if (
    violations.length > 0 ||
    typeof raw.normalized_code !== "string" ||
    !isStringRecord(docstrings) ||
    !isRecord(nameMappings) ||
    !isRecord(aliasMappings)
  ) {
    throw new SchemaError(subject, violations);
  }

  const languages = [...new Set([...Object.keys(docstrings), ...Object.keys(nameMappings)])].sort();
  const localizations: Record<string, LegacyLocalization> = {};
  for (const language of languages) {
    if (!isValidLanguageCode(language)) {
      throw new SchemaError(subject, [`'${language}' is not a valid language code`]);
    }
    const names = nameMappings[language];
    const aliases = aliasMappings[language];
    localizations[language] = {
      docstring: docstrings[language] ?? "",
      nameMapping: isStringRecord(names) ? { ...names } : {},
      aliasMapping: isStringRecord(aliases) ? { ...aliases } : {},
    };
  }

  return {
    generation: "legacy",
    hash,
    normalizedCode: raw.normalized_code,
    metadata,
    localizations,
  };
}

// Works on text: a legacy template whose hash starts with a digit is not parseable.
export function patchLegacyPoolReferences(code: string): string {
  const withImports = code.replace(POOL_IMPORT_STATEMENT, (statement: string, specifiers: string) => {
    const patched = specifiers.replace(BARE_HASH, `$1${POOL_IMPORT_PREFIX}$2`);
    return statement.replace(`{${specifiers}}`, `{${patched}}`);
  });
  return withImports.replace(BARE_RECEIVER, `$1${POOL_IMPORT_PREFIX}$2`);
}

export function toCurrentRecord(legacy: LegacyFunctionRecord, fallback: FunctionMetadata): ConvertedFunction {
  const metadata: FunctionMetadata = {
    ...fallback,
    created: legacy.metadata.created ?? fallback.created,
  };
  if (legacy.metadata.author !== undefined) {
    metadata.name = legacy.metadata.author;
  }

  return {
    hash: legacy.hash,
    normalizedCode: reformatTemplate(patchLegacyPoolReferences(legacy.normalizedCode)),
    metadata,
    mappings: Object.entries(legacy.localizations).map(([language, localization]) => ({
      language,
      content: {
        docstring: localization.docstring,
        nameMapping: localization.nameMapping,
        aliasMapping: localization.aliasMapping,
        comment: "",
      },
    })),
  };
}

export async function migrateLegacyFunction(
  storage: PoolStorage,
  hash: string,
  options: MigrationOptions,
): Promise<MigrationOutcome> {
  const log = (options.logger ?? createSilentLogger()).child({ service: "migration", hash });
  const generation = await storage.detectVersion(hash);
  if (generation === "not_found") {
    throw new NotFoundError("function", hash);
  }

  // An object left by an interrupted run is redone from the legacy file.
  let partial = false;
  if (generation === "current") {
    if (!(await storage.hasLegacy(hash)) || (await storage.validate(hash)).ok) {
      log.debug("Already on the current schema");
      return { hash, status: "skipped", languages: [], mappingHashes: [], errors: [] };
    }
    partial = true;
  }

  const legacy = parseLegacyRecord(await storage.readLegacyJson(hash), hash, storage.legacyPath(hash));
  const converted = toCurrentRecord(legacy, options.metadata);
  const languages = converted.mappings.map((mapping) => mapping.language);

  if (options.dryRun) {
    const mappingHashes = converted.mappings.map((mapping) => computeMappingHash(toMappingFile(mapping.content)));
    log.info("Migration planned", { languages, partial });
    return { hash, status: "planned", languages, mappingHashes, errors: [] };
  }

  if (partial) {
    log.warn("Discarding a partially migrated record");
    await storage.discardFunction(hash);
  }

  const saved = await storage.saveObject(hash, converted.normalizedCode, converted.metadata);
  const mappingHashes: string[] = [];
  for (const mapping of converted.mappings) {
    const result = await storage.saveMapping(hash, mapping.language, mapping.content);
    mappingHashes.push(result.mappingHash);
  }

  const validation = await storage.validate(hash);
  if (!validation.ok) {
    const errors = validation.errors.map((error) => error.message);
    if (saved.created) {
      await storage.discardFunction(hash);
    }
    log.warn("Migrated record failed validation; legacy file kept", { errors });
    return { hash, status: "failed", languages, mappingHashes, errors };
  }

  if (!options.keepLegacy) {
    await storage.removeLegacy(hash);
  }
  log.info("Migrated legacy record", { languages, keepLegacy: options.keepLegacy ?? false });
  return { hash, status: "migrated", languages, mappingHashes, errors: [] };
}

export async function migrateAllLegacy(storage: PoolStorage, options: MigrationOptions): Promise<MigrationReport> {
  const log = (options.logger ?? createSilentLogger()).child({ service: "migration" });
  const outcomes: MigrationOutcome[] = [];

  for (const hash of await storage.listLegacyHashes()) {
    try {
      outcomes.push(await migrateLegacyFunction(storage, hash, options));
    } catch (error) {
      log.warn("Legacy record could not be migrated", { hash, error: describeError(error) });
      outcomes.push({ hash, status: "failed", languages: [], mappingHashes: [], errors: [describeError(error)] });
    }
  }

  const report = summarizeMigration(outcomes);
  log.info("Migration finished", {
    migrated: report.migrated,
    planned: report.planned,
    skipped: report.skipped,
    failed: report.failed,
  });
  return report;
}

export function summarizeMigration(outcomes: MigrationOutcome[]): MigrationReport {
  const count = (status: MigrationStatus) => outcomes.filter((outcome) => outcome.status === status).length;
  return {
    outcomes,
    migrated: count("migrated"),
    planned: count("planned"),
    skipped: count("skipped"),
    failed: count("failed"),
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

import { promises as fs } from "node:fs";
import { canonicalizeFunctionSource } from "./canonicalizer.js";
import { computeIdentityHash, computeMappingHash } from "./content-hash.js";
import {
  buildFullPoolDependencyGraph,
  buildPoolDependencyGraph,
  getDependencyOrder,
  getDirectDependents,
} from "./dependency-graph.js";
import {
  type ResolvedFunction,
  type ResolveOptions,
  resolveFunction,
  runFunction,
} from "./dependency-resolver.js";
import {
  assertTemplateParses,
  denormalizeFunction,
  extractDependencies,
  replaceDependency,
  replaceDocstring,
} from "./denormalizer.js";
import { resolveLanguagePreference } from "./language-codes.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { assertValidPoolConfig, normalizePoolConfig, type PoolConfig, type PoolConfigInput, resolvePoolConfigFromEnv } from "./pool-config.js";
import {
  AmbiguousMappingError,
  describeError,
  InvalidInputError,
  NotFoundError,
  ValidationError,
} from "./pool-errors.js";
import { CALL_SLOT } from "./pool-references.js";
import { PoolStorage, requireHash, requireLanguage, toMappingFile } from "./pool-storage.js";
import type {
  FunctionMetadata,
  LocalizationMapping,
  MappingSummary,
  PoolValidationResult,
} from "./pool-types.js";
import {
  migrateAllLegacy,
  migrateLegacyFunction,
  type MigrationReport,
  readStoredFunction,
  summarizeMigration,
  toCurrentRecord,
} from "./schema-migration.js";

export interface FunctionPoolOptions {
  config?: PoolConfigInput;
  logger?: Logger;
  now?: () => Date;
}

export interface AddOptions {
  comment?: string;
  filePath?: string;
  parent?: string;
}

export interface AddResult {
  hash: string;
  mappingHash: string;
  objectCreated: boolean;
  mappingCreated: boolean;
  checks: string[];
}

export type ShowResult =
  | { kind: "source"; hash: string; language: string; mappingHash: string; code: string }
  | { kind: "ambiguous"; hash: string; language: string; candidates: MappingSummary[] };

export interface MigrateOptions {
  hash?: string;
  keepLegacy?: boolean;
  dryRun?: boolean;
}

export interface ValidateAllReport {
  results: PoolValidationResult[];
  valid: number;
  invalid: number;
}

export interface LogEntry {
  hash: string;
  created: string;
  name?: string;
  email?: string;
  parent?: string;
  languages: string[];
}

export interface SearchHit {
  hash: string;
  language: string;
  mappingHash: string;
  name: string;
  docstring: string;
}

export interface DependencyReport {
  hash: string;
  order: string[];
  missing: string[];
  cycles: string[][];
}

export interface ReviewItem {
  hash: string;
  language: string;
  mappingHash: string;
  code: string;
  dependencies: string[];
}

export interface ReviewReport {
  items: ReviewItem[];
  warnings: string[];
}

export interface RefactorResult {
  hash: string;
  parent: string;
  objectCreated: boolean;
  mappingHashes: string[];
}

export class FunctionPool {
  readonly config: PoolConfig;
  readonly storage: PoolStorage;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: FunctionPoolOptions = {}) {
    this.config = assertValidPoolConfig(normalizePoolConfig(options.config));
    this.storage = new PoolStorage(this.config.poolDirectory);
    this.logger = (options.logger ?? defaultLogger).child({ service: "pool" });
    this.now = options.now ?? (() => new Date());
  }

  static fromEnv(env: Record<string, string | undefined> = process.env, options: Omit<FunctionPoolOptions, "config"> = {}): FunctionPool {
    return new FunctionPool({ ...options, config: resolvePoolConfigFromEnv(env) });
  }

  async add(source: string, language: string, options: AddOptions = {}): Promise<AddResult> {
    requireLanguage(language);
    if (options.parent !== undefined) {
      requireHash(options.parent, "parent");
    }

    const canonical = canonicalizeFunctionSource(source, { filePath: options.filePath });
    assertTemplateParses(canonical.withDocstring);
    const hash = computeIdentityHash(canonical.withoutDocstring);
    const metadata = this.createMetadata({ parent: options.parent, checks: canonical.checks });

    const object = await this.storage.saveObject(hash, canonical.withDocstring, metadata);
    const mapping = await this.storage.saveMapping(hash, language, {
      docstring: canonical.docstring,
      nameMapping: canonical.nameMapping,
      aliasMapping: canonical.aliasMapping,
      comment: options.comment ?? "",
    });

    const validation = await this.storage.validate(hash);
    if (!validation.ok) {
      throw new ValidationError(hash, validation.errors.map((error) => error.message));
    }

    this.logger.info("Function added", {
      hash,
      language,
      mappingHash: mapping.mappingHash,
      objectCreated: object.created,
      mappingCreated: mapping.created,
    });
    return {
      hash,
      mappingHash: mapping.mappingHash,
      objectCreated: object.created,
      mappingCreated: mapping.created,
      checks: canonical.checks,
    };
  }

  async addFile(filePath: string, language: string, options: Omit<AddOptions, "filePath"> = {}): Promise<AddResult> {
    const source = await fs.readFile(filePath, "utf8");
    return this.add(source, language, { ...options, filePath });
  }

  async show(hash: string, language = this.config.languages[0], mappingHash?: string): Promise<ShowResult> {
    requireHash(hash, "hash");
    requireLanguage(language);
    if (mappingHash !== undefined) {
      requireHash(mappingHash, "mappingHash");
    }

    const stored = await readStoredFunction(this.storage, hash);
    if (stored.generation === "legacy") {
      const converted = toCurrentRecord(stored, this.createMetadata());
      const localized = converted.mappings.find((entry) => entry.language === language);
      if (!localized) {
        throw new NotFoundError("language", `${hash}@${language}`);
      }
      const legacyMappingHash = computeMappingHash(toMappingFile(localized.content));
      if (mappingHash !== undefined && mappingHash !== legacyMappingHash) {
        throw new NotFoundError("mapping", `${hash}/${language}/${mappingHash}`);
      }
      return {
        kind: "source",
        hash,
        language,
        mappingHash: legacyMappingHash,
        code: denormalizeFunction(converted.normalizedCode, localized.content),
      };
    }

    const selection = await this.storage.loadMapping(hash, language, mappingHash);
    switch (selection.status) {
      case "not_found":
        throw selection.reason === "mapping"
          ? new NotFoundError("mapping", `${hash}/${language}/${mappingHash ?? ""}`)
          : new NotFoundError("language", `${hash}@${language}`);
      case "ambiguous":
        return { kind: "ambiguous", hash, language, candidates: selection.candidates };
      case "selected":
        return {
          kind: "source",
          hash,
          language,
          mappingHash: selection.mapping.mappingHash,
          code: denormalizeFunction(stored.record.normalizedCode, selection.mapping),
        };
    }
  }

  async get(hash: string, language = this.config.languages[0]): Promise<string> {
    const shown = await this.show(hash, language);
    if (shown.kind === "ambiguous") {
      throw new AmbiguousMappingError(hash, language, shown.candidates);
    }
    return shown.code;
  }

  async migrate(options: MigrateOptions = {}): Promise<MigrationReport> {
    const migrationOptions = {
      metadata: this.createMetadata(),
      keepLegacy: options.keepLegacy,
      dryRun: options.dryRun,
      logger: this.logger,
    };

    if (options.hash === undefined) {
      return migrateAllLegacy(this.storage, migrationOptions);
    }

    const hash = requireHash(options.hash, "hash");
    const outcome = await migrateLegacyFunction(this.storage, hash, migrationOptions);
    if (outcome.status === "failed") {
      throw new ValidationError(hash, outcome.errors);
    }
    return summarizeMigration([outcome]);
  }

  async validate(hash: string): Promise<PoolValidationResult> {
    return this.storage.validate(requireHash(hash, "hash"));
  }

  async validateAll(): Promise<ValidateAllReport> {
    const results: PoolValidationResult[] = [];
    for (const hash of await this.storage.listFunctionHashes()) {
      let result: PoolValidationResult;
      try {
        result = await this.storage.validate(hash);
      } catch (error) {
        result = {
          ok: false,
          hash,
          errors: [{ code: "object_unreadable", severity: "error", message: describeError(error) }],
        };
      }
      if (!result.ok) {
        this.logger.warn("Function failed validation", { hash, errors: result.errors.map((error) => error.message) });
      }
      results.push(result);
    }

    const valid = results.filter((result) => result.ok).length;
    this.logger.info("Validation finished", { valid, invalid: results.length - valid });
    return { results, valid, invalid: results.length - valid };
  }

  async log(): Promise<LogEntry[]> {
    const entries: LogEntry[] = [];
    for (const hash of await this.storage.listFunctionHashes()) {
      try {
        const object = await this.storage.loadObject(hash);
        const entry: LogEntry = {
          hash,
          created: object.metadata.created,
          languages: await this.storage.listLanguages(hash),
        };
        if (object.metadata.name) {
          entry.name = object.metadata.name;
        }
        if (object.metadata.email) {
          entry.email = object.metadata.email;
        }
        if (object.metadata.parent) {
          entry.parent = object.metadata.parent;
        }
        entries.push(entry);
      } catch (error) {
        this.logger.warn("Skipping unreadable function in log", { hash, error: describeError(error) });
      }
    }

    return entries.sort((left, right) => {
      if (left.created !== right.created) {
        return left.created < right.created ? 1 : -1;
      }
      return left.hash < right.hash ? -1 : 1;
    });
  }

  async search(terms: string[], language?: string): Promise<SearchHit[]> {
    const needles = terms.map((term) => term.trim().toLowerCase()).filter((term) => term.length > 0);
    if (needles.length === 0) {
      throw new InvalidInputError("terms", "at least one search term is required");
    }
    if (language !== undefined) {
      requireLanguage(language);
    }

    const hits: SearchHit[] = [];
    for (const hash of await this.storage.listFunctionHashes()) {
      const languages = language === undefined ? await this.storage.listLanguages(hash) : [language];
      for (const candidate of languages) {
        for (const mappingHash of await this.storage.listMappingHashes(hash, candidate)) {
          const mapping = await this.storage.readMapping(hash, candidate, mappingHash);
          const haystack = [...Object.values(mapping.nameMapping), mapping.docstring, mapping.comment]
            .join("\n")
            .toLowerCase();
          if (needles.every((needle) => haystack.includes(needle))) {
            hits.push({
              hash,
              language: candidate,
              mappingHash,
              name: mapping.nameMapping[CALL_SLOT] ?? "",
              docstring: mapping.docstring.split("\n")[0] ?? "",
            });
          }
        }
      }
    }
    return hits;
  }

  async callers(hash: string): Promise<string[]> {
    requireHash(hash, "hash");
    const graph = await buildFullPoolDependencyGraph(this.storage);
    return graph ? getDirectDependents(graph, hash) : [];
  }

  async checks(hash: string): Promise<string[]> {
    requireHash(hash, "hash");
    const checkers: string[] = [];
    for (const candidate of await this.storage.listFunctionHashes()) {
      const object = await this.storage.loadObject(candidate);
      if (object.metadata.checks?.includes(hash)) {
        checkers.push(candidate);
      }
    }
    return checkers;
  }

  async dependencies(hash: string): Promise<DependencyReport> {
    requireHash(hash, "hash");
    if (!(await this.storage.hasFunction(hash))) {
      throw new NotFoundError("function", hash);
    }
    const graph = await buildPoolDependencyGraph(this.storage, hash);
    return {
      hash,
      order: getDependencyOrder(graph, hash, { includeMissing: false }),
      missing: [...new Set(graph.missingDependencyRefs.map((ref) => ref.dependencyHash))].sort(),
      cycles: graph.cyclicSccs.map((component) => component.slice()),
    };
  }

  async review(hash: string, languages: string[] = this.config.languages): Promise<ReviewReport> {
    requireHash(hash, "hash");
    languages.forEach((language) => requireLanguage(language));

    const items: ReviewItem[] = [];
    const warnings: string[] = [];
    const queue = [hash];
    const seen = new Set(queue);

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      try {
        const item = await this.reviewOne(current, languages, warnings);
        if (!item) {
          continue;
        }
        items.push(item);
        for (const dependency of item.dependencies) {
          if (!seen.has(dependency)) {
            seen.add(dependency);
            queue.push(dependency);
          }
        }
      } catch (error) {
        const message = `${current}: ${describeError(error)}`;
        warnings.push(message);
        this.logger.warn("Review item failed", { hash: current, error: describeError(error) });
      }
    }

    return { items, warnings };
  }

  async refactor(what: string, from: string, to: string): Promise<RefactorResult> {
    requireHash(what, "what");
    requireHash(from, "from");
    requireHash(to, "to");

    const object = await this.storage.loadObject(what);
    if (!extractDependencies(object.normalizedCode).includes(from)) {
      throw new InvalidInputError("from", `${what} does not depend on ${from}`);
    }
    if (!(await this.storage.hasFunction(to))) {
      throw new NotFoundError("function", to);
    }

    const template = replaceDependency(object.normalizedCode, from, to);
    const hash = computeIdentityHash(replaceDocstring(template, ""));
    const saved = await this.storage.saveObject(
      hash,
      template,
      this.createMetadata({ parent: what, checks: object.metadata.checks }),
    );

    const mappingHashes: string[] = [];
    for (const language of await this.storage.listLanguages(what)) {
      for (const mappingHash of await this.storage.listMappingHashes(what, language)) {
        const mapping = await this.storage.readMapping(what, language, mappingHash);
        const result = await this.storage.saveMapping(hash, language, {
          docstring: mapping.docstring,
          nameMapping: mapping.nameMapping,
          aliasMapping: rekeyAlias(mapping, from, to),
          comment: mapping.comment,
        });
        mappingHashes.push(result.mappingHash);
      }
    }

    const validation = await this.storage.validate(hash);
    if (!validation.ok) {
      throw new ValidationError(hash, validation.errors.map((error) => error.message));
    }
    this.logger.info("Function refactored", { hash, parent: what, from, to });
    return { hash, parent: what, objectCreated: saved.created, mappingHashes };
  }

  async resolve(hash: string, options: ResolveOptions = {}): Promise<ResolvedFunction> {
    requireHash(hash, "hash");
    return resolveFunction(this.storage, hash, this.resolveOptions(options));
  }

  async run(hash: string, args: unknown[] = [], options: ResolveOptions = {}): Promise<unknown> {
    requireHash(hash, "hash");
    return runFunction(this.storage, hash, args, this.resolveOptions(options));
  }

  private resolveOptions(options: ResolveOptions): ResolveOptions {
    return {
      ...options,
      languages: options.languages ?? this.config.languages,
      logger: options.logger ?? this.logger,
    };
  }

  private async reviewOne(hash: string, languages: string[], warnings: string[]): Promise<ReviewItem | undefined> {
    if (!(await this.storage.hasFunction(hash))) {
      warnings.push(`${hash}: function not found in pool`);
      return undefined;
    }

    const resolution = resolveLanguagePreference(await this.storage.listLanguages(hash), languages);
    if (!resolution.effective) {
      warnings.push(`${hash}: no mapping in ${languages.join(", ")}`);
      return undefined;
    }
    if (resolution.fallbackApplied) {
      warnings.push(`${hash}: shown in '${resolution.effective}' (fallback)`);
    }

    let shown = await this.show(hash, resolution.effective);
    if (shown.kind === "ambiguous") {
      const first = shown.candidates[0];
      warnings.push(`${hash}: ${shown.candidates.length} mappings in '${shown.language}', showing ${first.mappingHash}`);
      shown = await this.show(hash, resolution.effective, first.mappingHash);
    }
    if (shown.kind !== "source") {
      return undefined;
    }

    const object = await this.storage.loadObject(hash);
    return {
      hash,
      language: shown.language,
      mappingHash: shown.mappingHash,
      code: shown.code,
      dependencies: extractDependencies(object.normalizedCode),
    };
  }

  private createMetadata(extra: { parent?: string; checks?: string[] } = {}): FunctionMetadata {
    const metadata: FunctionMetadata = { created: formatTimestamp(this.now()) };
    if (this.config.author.name) {
      metadata.name = this.config.author.name;
    }
    if (this.config.author.email) {
      metadata.email = this.config.author.email;
    }
    if (extra.parent !== undefined) {
      metadata.parent = extra.parent;
    }
    if (extra.checks !== undefined && extra.checks.length > 0) {
      metadata.checks = extra.checks.slice();
    }
    return metadata;
  }
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function rekeyAlias(mapping: LocalizationMapping, from: string, to: string): Record<string, string> {
  const aliases = { ...mapping.aliasMapping };
  const alias = aliases[from];
  delete aliases[from];
  if (alias !== undefined && aliases[to] === undefined) {
    aliases[to] = alias;
  }
  return aliases;
}

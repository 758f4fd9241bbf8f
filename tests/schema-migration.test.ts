import { promises as fs } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { computeMappingHash } from "../src/content-hash.js";
import { denormalizeFunction } from "../src/denormalizer.js";
import { createLogger, createMemorySink } from "../src/logger.js";
import { SchemaError } from "../src/pool-errors.js";
import { PoolStorage } from "../src/pool-storage.js";
import {
  migrateAllLegacy,
  migrateLegacyFunction,
  parseLegacyRecord,
  patchLegacyPoolReferences,
  readStoredFunction,
} from "../src/schema-migration.js";

const LEGACY_HASH = `1${"2".repeat(63)}`;
const EMPTY_HASH = "4".repeat(64);
const MALFORMED_HASH = "5".repeat(64);
const DEPENDENCY = "3".repeat(64);
const FALLBACK = { created: "2026-01-02T03:04:05Z", name: "Test Author" };

const LEGACY_RECORD = {
  version: 0,
  hash: LEGACY_HASH,
  normalized_code: `import { ${DEPENDENCY} } from "funcpool/pool";\nfunction _fp_v_0(_fp_v_1) {\n  return ${DEPENDENCY}._fp_v_0(_fp_v_1) + 1;\n}`,
  docstrings: { eng: "Increment the helper result", fra: "Incrémente le résultat" },
  name_mappings: {
    eng: { _fp_v_0: "bump", _fp_v_1: "value" },
    fra: { _fp_v_0: "augmenter", _fp_v_1: "valeur" },
  },
  alias_mappings: { eng: { [DEPENDENCY]: "helper" }, fra: { [DEPENDENCY]: "aide" } },
  metadata: { created: "2020-05-06T07:08:09Z", author: "Legacy Author" },
};

const MIGRATED_CODE = [
  `import { object_${DEPENDENCY} } from "funcpool/pool";`,
  "function _fp_v_0(_fp_v_1) {",
  `  return object_${DEPENDENCY}._fp_v_0(_fp_v_1) + 1;`,
  "}",
].join("\n");

const tempDirs: string[] = [];

async function createStorage(): Promise<PoolStorage> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "funcpool-migration-"));
  tempDirs.push(dir);
  return new PoolStorage(dir);
}

async function writeLegacy(storage: PoolStorage, hash: string, content: string): Promise<void> {
  const target = storage.legacyPath(hash);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content, "utf8");
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("legacy pool references", () => {
  test("prefixes bare hashes in pool imports and call receivers", () => {
    expect(patchLegacyPoolReferences(LEGACY_RECORD.normalized_code)).toBe(MIGRATED_CODE);
  });

  test("leaves hashes that are not pool references alone", () => {
    const code = `function _fp_v_0() {\n  return "${DEPENDENCY}";\n}`;
    expect(patchLegacyPoolReferences(code)).toBe(code);
  });
});

describe("legacy record parsing", () => {
  test("collects localizations per language", () => {
    const record = parseLegacyRecord(LEGACY_RECORD, LEGACY_HASH);

    expect(record.generation).toBe("legacy");
    expect(record.metadata).toEqual({ created: "2020-05-06T07:08:09Z", author: "Legacy Author" });
    expect(Object.keys(record.localizations)).toEqual(["eng", "fra"]);
    expect(record.localizations.fra).toEqual({
      docstring: "Incrémente le résultat",
      nameMapping: { _fp_v_0: "augmenter", _fp_v_1: "valeur" },
      aliasMapping: { [DEPENDENCY]: "aide" },
    });
  });

  test("rejects records that do not match their file", () => {
    expect(() => parseLegacyRecord({ ...LEGACY_RECORD, version: 3 }, LEGACY_HASH)).toThrow("version must be 0, found 3");
    expect(() => parseLegacyRecord(LEGACY_RECORD, EMPTY_HASH)).toThrow(SchemaError);
    expect(() => parseLegacyRecord({ ...LEGACY_RECORD, normalized_code: "" }, LEGACY_HASH)).toThrow(
      "normalized_code must be a non-empty string",
    );
    expect(() => parseLegacyRecord(["not", "a", "record"], LEGACY_HASH)).toThrow("legacy record must be a JSON object");
  });
});

describe("schema migration", () => {
  test("moves a legacy record to the current layout under the same hash", async () => {
    const storage = await createStorage();
    await writeLegacy(storage, LEGACY_HASH, JSON.stringify(LEGACY_RECORD));

    const outcome = await migrateLegacyFunction(storage, LEGACY_HASH, { metadata: FALLBACK });

    expect(outcome).toEqual({
      hash: LEGACY_HASH,
      status: "migrated",
      languages: ["eng", "fra"],
      mappingHashes: [
        computeMappingHash({
          docstring: "Increment the helper result",
          name_mapping: { _fp_v_0: "bump", _fp_v_1: "value" },
          alias_mapping: { [DEPENDENCY]: "helper" },
          comment: "",
        }),
        computeMappingHash({
          docstring: "Incrémente le résultat",
          name_mapping: { _fp_v_0: "augmenter", _fp_v_1: "valeur" },
          alias_mapping: { [DEPENDENCY]: "aide" },
          comment: "",
        }),
      ],
      errors: [],
    });
    expect(await storage.loadObject(LEGACY_HASH)).toEqual({
      hash: LEGACY_HASH,
      schemaVersion: 1,
      normalizedCode: MIGRATED_CODE,
      metadata: { created: "2020-05-06T07:08:09Z", name: "Legacy Author" },
    });
    expect(await storage.detectVersion(LEGACY_HASH)).toBe("current");
    expect(await storage.listLegacyHashes()).toEqual([]);

    const selection = await storage.loadMapping(LEGACY_HASH, "eng");
    if (selection.status !== "selected") {
      throw new Error(`expected a single english mapping, got ${selection.status}`);
    }
    expect(denormalizeFunction(MIGRATED_CODE, selection.mapping)).toBe(
      [
        `import { object_${DEPENDENCY} as helper } from "funcpool/pool";`,
        "/**",
        " * Increment the helper result",
        " */",
        "function bump(value) {",
        "  return helper(value) + 1;",
        "}",
      ].join("\n"),
    );
  });

  test("keeps the legacy file when asked and skips current records", async () => {
    const storage = await createStorage();
    await writeLegacy(storage, LEGACY_HASH, JSON.stringify(LEGACY_RECORD));

    await migrateLegacyFunction(storage, LEGACY_HASH, { metadata: FALLBACK, keepLegacy: true });
    expect(await storage.listLegacyHashes()).toEqual([LEGACY_HASH]);

    const stored = await readStoredFunction(storage, LEGACY_HASH);
    expect(stored.generation).toBe("current");

    const again = await migrateLegacyFunction(storage, LEGACY_HASH, { metadata: FALLBACK });
    expect(again.status).toBe("skipped");
  });

  test("redoes a record left without mappings by an interrupted run", async () => {
    const storage = await createStorage();
    await writeLegacy(storage, LEGACY_HASH, JSON.stringify(LEGACY_RECORD));
    await storage.saveObject(LEGACY_HASH, MIGRATED_CODE, FALLBACK);
    expect((await storage.validate(LEGACY_HASH)).ok).toBe(false);

    const report = await migrateAllLegacy(storage, { metadata: FALLBACK });

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["migrated"]);
    expect((await storage.validate(LEGACY_HASH)).ok).toBe(true);
    expect(await storage.listLanguages(LEGACY_HASH)).toEqual(["eng", "fra"]);
    expect((await storage.loadObject(LEGACY_HASH)).metadata).toEqual({
      created: "2020-05-06T07:08:09Z",
      name: "Legacy Author",
    });
    expect(await storage.listLegacyHashes()).toEqual([]);
  });

  test("plans without writing on a dry run", async () => {
    const storage = await createStorage();
    await writeLegacy(storage, LEGACY_HASH, JSON.stringify(LEGACY_RECORD));

    const outcome = await migrateLegacyFunction(storage, LEGACY_HASH, { metadata: FALLBACK, dryRun: true });

    expect(outcome.status).toBe("planned");
    expect(outcome.mappingHashes).toHaveLength(2);
    expect(await storage.listFunctionHashes()).toEqual([]);
    expect(await storage.detectVersion(LEGACY_HASH)).toBe("legacy");
  });

  test("rolls back a migrated record that fails validation", async () => {
    const storage = await createStorage();
    await writeLegacy(storage, EMPTY_HASH, JSON.stringify({ normalized_code: "function _fp_v_0() {\n  return 1;\n}" }));

    const outcome = await migrateLegacyFunction(storage, EMPTY_HASH, { metadata: FALLBACK });

    expect(outcome.status).toBe("failed");
    expect(outcome.errors).toEqual([`Function ${EMPTY_HASH} has no language mappings.`]);
    expect(await storage.detectVersion(EMPTY_HASH)).toBe("legacy");
  });

  test("migrates every legacy record and tallies failures", async () => {
    const storage = await createStorage();
    const sink = createMemorySink();
    const logger = createLogger({}, { sink: sink.sink, minLevel: "debug" });
    await writeLegacy(storage, LEGACY_HASH, JSON.stringify(LEGACY_RECORD));
    await writeLegacy(storage, EMPTY_HASH, JSON.stringify({ normalized_code: "function _fp_v_0() {\n  return 1;\n}" }));
    await writeLegacy(storage, MALFORMED_HASH, "{oops");

    const report = await migrateAllLegacy(storage, { metadata: FALLBACK, logger });

    expect(report.outcomes.map((outcome) => [outcome.hash, outcome.status])).toEqual([
      [LEGACY_HASH, "migrated"],
      [EMPTY_HASH, "failed"],
      [MALFORMED_HASH, "failed"],
    ]);
    expect(report).toMatchObject({ migrated: 1, planned: 0, skipped: 0, failed: 2 });
    expect(await storage.listLegacyHashes()).toEqual([EMPTY_HASH, MALFORMED_HASH]);

    const warnings = sink.records.filter((record) => record.level === "warn");
    expect(warnings.map((record) => [record.message, record.context.hash])).toEqual([
      ["Migrated record failed validation; legacy file kept", EMPTY_HASH],
      ["Legacy record could not be migrated", MALFORMED_HASH],
    ]);
  });
});

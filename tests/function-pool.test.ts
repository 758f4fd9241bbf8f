import { promises as fs } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { computeIdentityHash } from "../src/content-hash.js";
import { FunctionPool, formatTimestamp } from "../src/function-pool.js";
import { createSilentLogger } from "../src/logger.js";
import { AmbiguousMappingError, InvalidInputError, NotFoundError, SourceSyntaxError } from "../src/pool-errors.js";

const ENGLISH_SUM = [
  "/**",
  " * Add two numbers",
  " */",
  "function calculate_sum(first, second) {",
  "  const result = first + second;",
  "  return result;",
  "}",
].join("\n");

const FRENCH_SUM = [
  "/**",
  " * Additionner deux nombres",
  " */",
  "function calculer_somme(premier, second) {",
  "  const resultat = premier + second;",
  "  return resultat;",
  "}",
].join("\n");

const DOUBLE = "function double(value) {\n  return value * 2;\n}";
const TRIPLE = "function triple(value) {\n  return value * 3;\n}";

function quadrupleSource(helperHash: string): string {
  return [
    `import { object_${helperHash} as twice } from "funcpool/pool";`,
    "function quadruple(value) {",
    "  return twice(twice(value));",
    "}",
  ].join("\n");
}

const tempDirs: string[] = [];

async function createPoolDirectory(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "funcpool-pool-"));
  tempDirs.push(dir);
  return dir;
}

function openPool(dir: string, created = "2026-01-02T03:04:05.678Z"): FunctionPool {
  return new FunctionPool({
    config: {
      poolDirectory: dir,
      author: { name: "Test Author", email: "author@example.com" },
      languages: ["eng"],
    },
    logger: createSilentLogger(),
    now: () => new Date(created),
  });
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("function pool", () => {
  test("stores translations of one function under one hash", async () => {
    const pool = openPool(await createPoolDirectory());

    const english = await pool.add(ENGLISH_SUM, "eng");
    const french = await pool.add(FRENCH_SUM, "fra");

    expect(french.hash).toBe(english.hash);
    expect(english).toMatchObject({ objectCreated: true, mappingCreated: true, checks: [] });
    expect(french).toMatchObject({ objectCreated: false, mappingCreated: true });
    expect(await pool.get(english.hash)).toBe(ENGLISH_SUM);
    expect(await pool.get(english.hash, "fra")).toBe(FRENCH_SUM);

    const again = await pool.add(ENGLISH_SUM, "eng");
    expect(again).toEqual({
      hash: english.hash,
      mappingHash: english.mappingHash,
      objectCreated: false,
      mappingCreated: false,
      checks: [],
    });

    const object = await pool.storage.loadObject(english.hash);
    expect(object.metadata).toEqual({
      created: "2026-01-02T03:04:05Z",
      name: "Test Author",
      email: "author@example.com",
    });
  });

  test("reports several mappings for one language instead of guessing", async () => {
    const pool = openPool(await createPoolDirectory());
    const first = await pool.add(ENGLISH_SUM, "eng");
    const second = await pool.add(ENGLISH_SUM.replace(/first/g, "left"), "eng", { comment: "short names" });

    const shown = await pool.show(first.hash, "eng");
    expect(shown).toEqual({
      kind: "ambiguous",
      hash: first.hash,
      language: "eng",
      candidates: [
        { mappingHash: first.mappingHash, comment: "" },
        { mappingHash: second.mappingHash, comment: "short names" },
      ].sort((left, right) => (left.mappingHash < right.mappingHash ? -1 : 1)),
    });
    await expect(pool.get(first.hash)).rejects.toThrow(AmbiguousMappingError);

    const picked = await pool.show(first.hash, "eng", second.mappingHash);
    expect(picked.kind === "source" ? picked.code : "").toContain("function calculate_sum(left, second) {");
  });

  test("shows helper aliases verbatim and runs through them", async () => {
    const pool = openPool(await createPoolDirectory());
    const helper = await pool.add(DOUBLE, "eng");
    const caller = await pool.add(quadrupleSource(helper.hash), "eng");

    expect(await pool.get(caller.hash)).toBe(quadrupleSource(helper.hash));
    await expect(pool.run(caller.hash, [3])).resolves.toBe(12);
    expect(await pool.callers(helper.hash)).toEqual([caller.hash]);
    expect(await pool.callers(caller.hash)).toEqual([]);
    expect(await pool.dependencies(caller.hash)).toEqual({
      hash: caller.hash,
      order: [helper.hash],
      missing: [],
      cycles: [],
    });

    const review = await pool.review(caller.hash);
    expect(review.warnings).toEqual([]);
    expect(review.items.map((item) => [item.hash, item.code, item.dependencies])).toEqual([
      [caller.hash, quadrupleSource(helper.hash), [helper.hash]],
      [helper.hash, DOUBLE, []],
    ]);
  });

  test("keeps calls to different host globals apart", async () => {
    const pool = openPool(await createPoolDirectory());
    const decode = await pool.add("function decode(text) {\n  return atob(text);\n}", "eng");
    const encode = await pool.add("function encode(text) {\n  return btoa(text);\n}", "eng");

    expect(decode.hash).not.toBe(encode.hash);
    await expect(pool.run(encode.hash, ["hi"])).resolves.toBe("aGk=");
    await expect(pool.run(decode.hash, ["aGk="])).resolves.toBe("hi");
  });

  test("renames labels together with their break targets", async () => {
    const pool = openPool(await createPoolDirectory());
    const source = [
      "function first_negative(values) {",
      "  let found = 0;",
      "  search: for (const value of values) {",
      "    if (value < 0) {",
      "      found = value;",
      "      break search;",
      "    }",
      "  }",
      "  return found;",
      "}",
    ].join("\n");

    const added = await pool.add(source, "eng");

    expect((await pool.storage.loadObject(added.hash)).normalizedCode).toBe(
      [
        "function _fp_v_0(_fp_v_1) {",
        "  let _fp_v_2 = 0;",
        "  _fp_v_3: for (const _fp_v_4 of _fp_v_1) {",
        "    if (_fp_v_4 < 0) {",
        "      _fp_v_2 = _fp_v_4;",
        "      break _fp_v_3;",
        "    }",
        "  }",
        "  return _fp_v_2;",
        "}",
      ].join("\n"),
    );
    expect(await pool.get(added.hash)).toBe(source);
    await expect(pool.run(added.hash, [[3, -2, -5]])).resolves.toBe(-2);
  });

  test("reviews with a fallback language and warns about it", async () => {
    const pool = openPool(await createPoolDirectory());
    const added = await pool.add(FRENCH_SUM, "fra");

    const review = await pool.review(added.hash, ["eng", "fra"]);

    expect(review.items.map((item) => item.language)).toEqual(["fra"]);
    expect(review.warnings).toEqual([`${added.hash}: shown in 'fra' (fallback)`]);
    await expect(pool.show(added.hash, "eng")).rejects.toThrow(NotFoundError);
  });

  test("records which functions check another", async () => {
    const pool = openPool(await createPoolDirectory());
    const helper = await pool.add(DOUBLE, "eng");
    const tester = await pool.add(
      [
        `import { object_${helper.hash} as double } from "funcpool/pool";`,
        "/**",
        " * Checks doubling.",
        " * @check double",
        " */",
        "function check_double() {",
        "  return double(2) === 4;",
        "}",
      ].join("\n"),
      "eng",
    );

    expect(tester.checks).toEqual([helper.hash]);
    expect(await pool.checks(helper.hash)).toEqual([tester.hash]);
    expect(await pool.checks(tester.hash)).toEqual([]);
    await expect(pool.run(tester.hash)).resolves.toBe(true);
  });

  test("lists history newest first and searches mappings", async () => {
    const dir = await createPoolDirectory();
    const older = await openPool(dir, "2026-01-01T00:00:00.000Z").add(ENGLISH_SUM, "eng");
    const pool = openPool(dir, "2026-02-01T00:00:00.000Z");
    const newer = await pool.add(DOUBLE, "eng");

    expect(await pool.log()).toEqual([
      {
        hash: newer.hash,
        created: "2026-02-01T00:00:00Z",
        name: "Test Author",
        email: "author@example.com",
        languages: ["eng"],
      },
      {
        hash: older.hash,
        created: "2026-01-01T00:00:00Z",
        name: "Test Author",
        email: "author@example.com",
        languages: ["eng"],
      },
    ]);

    expect(await pool.search(["SUM", "numbers"])).toEqual([
      {
        hash: older.hash,
        language: "eng",
        mappingHash: older.mappingHash,
        name: "calculate_sum",
        docstring: "Add two numbers",
      },
    ]);
    expect(await pool.search(["sum"], "fra")).toEqual([]);
    await expect(pool.search(["  "])).rejects.toThrow(InvalidInputError);
  });

  test("refactors a caller onto another dependency", async () => {
    const pool = openPool(await createPoolDirectory());
    const double = await pool.add(DOUBLE, "eng");
    const triple = await pool.add(TRIPLE, "eng");
    const caller = await pool.add(quadrupleSource(double.hash), "eng");

    const result = await pool.refactor(caller.hash, double.hash, triple.hash);

    const expectedCode = [
      `import { object_${triple.hash} } from "funcpool/pool";`,
      "function _fp_v_0(_fp_v_1) {",
      `  return object_${triple.hash}._fp_v_0(object_${triple.hash}._fp_v_0(_fp_v_1));`,
      "}",
    ].join("\n");
    expect(result).toMatchObject({ hash: computeIdentityHash(expectedCode), parent: caller.hash, objectCreated: true });
    expect(result.mappingHashes).toHaveLength(1);
    expect(await pool.get(result.hash)).toBe(quadrupleSource(triple.hash));
    expect((await pool.storage.loadObject(result.hash)).metadata.parent).toBe(caller.hash);
    await expect(pool.run(result.hash, [3])).resolves.toBe(27);

    await expect(pool.refactor(caller.hash, triple.hash, double.hash)).rejects.toThrow(
      `from: ${caller.hash} does not depend on ${triple.hash}`,
    );
  });

  test("shows and migrates legacy records", async () => {
    const dir = await createPoolDirectory();
    const pool = openPool(dir);
    const legacyHash = "7".repeat(64);
    const legacyPath = pool.storage.legacyPath(legacyHash);
    await fs.mkdir(path.dirname(legacyPath), { recursive: true });
    await fs.writeFile(
      legacyPath,
      JSON.stringify({
        normalized_code: "function _fp_v_0(_fp_v_1) {\n  return -_fp_v_1;\n}",
        docstrings: { eng: "Negate" },
        name_mappings: { eng: { _fp_v_0: "negate", _fp_v_1: "value" } },
        alias_mappings: {},
      }),
      "utf8",
    );

    const legacyCode = "/**\n * Negate\n */\nfunction negate(value) {\n  return -value;\n}";
    expect(await pool.get(legacyHash)).toBe(legacyCode);

    const report = await pool.migrate({ hash: legacyHash });
    expect(report).toMatchObject({ migrated: 1, failed: 0 });
    expect(await pool.get(legacyHash)).toBe(legacyCode);
    expect(await pool.validateAll()).toMatchObject({ valid: 1, invalid: 0 });
  });

  test("validates input before touching the pool", async () => {
    const pool = openPool(await createPoolDirectory());

    await expect(pool.add(DOUBLE, "en")).rejects.toThrow(InvalidInputError);
    await expect(pool.add("function broken( {", "eng")).rejects.toThrow(SourceSyntaxError);
    await expect(pool.show("abc")).rejects.toThrow("hash: 'abc' is not a 64-character lowercase hex sha256 digest");
    await expect(pool.show("f".repeat(64))).rejects.toThrow(`Function not found: ${"f".repeat(64)}`);
    await expect(pool.dependencies("f".repeat(64))).rejects.toThrow(NotFoundError);
  });

  test("reads its configuration from the environment", async () => {
    const dir = await createPoolDirectory();
    const pool = FunctionPool.fromEnv(
      { FUNCPOOL_DIRECTORY: dir, FUNCPOOL_LANGUAGES: "fra, eng", USER: "ada" },
      { logger: createSilentLogger() },
    );

    expect(pool.config).toEqual({ poolDirectory: dir, author: { name: "ada", email: "" }, languages: ["fra", "eng"] });
    expect(pool.storage.root).toBe(dir);
  });

  test("formats timestamps without milliseconds", () => {
    expect(formatTimestamp(new Date("2026-03-04T05:06:07.890Z"))).toBe("2026-03-04T05:06:07Z");
  });
});

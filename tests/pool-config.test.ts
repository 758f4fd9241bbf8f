import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import {
  DEFAULT_POOL_CONFIG,
  assertValidPoolConfig,
  normalizePoolConfig,
  resolvePoolConfigFromEnv,
  validatePoolConfig,
} from "../src/pool-config.js";
import { InvalidInputError } from "../src/pool-errors.js";

describe("pool config", () => {
  test("defaults to the home pool directory and english", () => {
    expect(DEFAULT_POOL_CONFIG.poolDirectory).toBe(path.join(os.homedir(), ".local", "funcpool", "pool"));
    expect(normalizePoolConfig()).toEqual(DEFAULT_POOL_CONFIG);
  });

  test("normalization trims, lowercases and dedupes", () => {
    const config = normalizePoolConfig({
      poolDirectory: " /tmp/funcpool/../pool ",
      author: { name: " Ada ", email: " ada@example.com " },
      languages: ["ENG", " fra", "eng", ""],
    });

    expect(config).toEqual({
      poolDirectory: "/tmp/pool",
      author: { name: "Ada", email: "ada@example.com" },
      languages: ["eng", "fra"],
    });
    expect(normalizePoolConfig({ languages: [] }).languages).toEqual(["eng"]);
  });

  test("invalid config returns clear errors", () => {
    const result = validatePoolConfig({
      poolDirectory: "relative/pool",
      author: { name: "", email: "not-an-email" },
      languages: ["en", "fra"],
    });

    expect(result.ok).toBe(false);
    expect(result.errors.map((error) => error.path)).toEqual(["poolDirectory", "author.email", "languages[0]"]);
    expect(() =>
      assertValidPoolConfig({ poolDirectory: "/tmp/pool", author: { name: "", email: "" }, languages: ["x"] }),
    ).toThrow(InvalidInputError);
  });

  test("reads overrides from the environment", () => {
    expect(
      resolvePoolConfigFromEnv({
        FUNCPOOL_DIRECTORY: "/srv/pool",
        FUNCPOOL_AUTHOR_NAME: "Grace",
        FUNCPOOL_AUTHOR_EMAIL: "grace@example.com",
        FUNCPOOL_LANGUAGES: "spa,eng spa",
        USER: "ignored",
      }),
    ).toEqual({
      poolDirectory: "/srv/pool",
      author: { name: "Grace", email: "grace@example.com" },
      languages: ["spa", "eng"],
    });

    const fallback = resolvePoolConfigFromEnv({ USERNAME: "lin" });
    expect(fallback.author).toEqual({ name: "lin", email: "" });
    expect(fallback.languages).toEqual(["eng"]);
    expect(fallback.poolDirectory).toBe(DEFAULT_POOL_CONFIG.poolDirectory);
  });
});

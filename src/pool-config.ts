import os from "node:os";
import path from "node:path";
import { DEFAULT_LANGUAGE, isValidLanguageCode, parseLanguageList } from "./language-codes.js";
import { InvalidInputError } from "./pool-errors.js";

export interface AuthorIdentity {
  name: string;
  email: string;
}

export interface PoolConfig {
  poolDirectory: string;
  author: AuthorIdentity;
  languages: string[];
}

export type PoolConfigInput = Omit<Partial<PoolConfig>, "author"> & {
  author?: Partial<AuthorIdentity>;
};

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  errors: ConfigValidationError[];
}

export type PoolEnvironment = Record<string, string | undefined>;

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  poolDirectory: path.join(os.homedir(), ".local", "funcpool", "pool"),
  author: {
    name: "",
    email: "",
  },
  languages: [DEFAULT_LANGUAGE],
};

export function normalizePoolConfig(input: PoolConfigInput = {}): PoolConfig {
  const merged: PoolConfig = {
    ...DEFAULT_POOL_CONFIG,
    ...input,
    author: {
      ...DEFAULT_POOL_CONFIG.author,
      ...input.author,
    },
  };

  const languages = [...new Set(merged.languages.map((language) => language.trim().toLowerCase()))].filter(
    (language) => language.length > 0,
  );

  return {
    poolDirectory: path.resolve(merged.poolDirectory.trim()),
    author: {
      name: merged.author.name.trim(),
      email: merged.author.email.trim(),
    },
    languages: languages.length > 0 ? languages : [DEFAULT_LANGUAGE],
  };
}

export function validatePoolConfig(config: PoolConfig): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  if (!config.poolDirectory) {
    errors.push({ path: "poolDirectory", message: "Pool directory is required." });
  } else if (!path.isAbsolute(config.poolDirectory)) {
    errors.push({ path: "poolDirectory", message: "Pool directory must be an absolute path." });
  }

  if (config.author.email && !/^[^\s@]+@[^\s@]+$/.test(config.author.email)) {
    errors.push({ path: "author.email", message: "Email must look like user@host." });
  }

  if (config.languages.length === 0) {
    errors.push({ path: "languages", message: "At least one language is required." });
  }
  config.languages.forEach((language, index) => {
    if (!isValidLanguageCode(language)) {
      errors.push({
        path: `languages[${index}]`,
        message: `'${language}' must be 3 to 256 characters of a-z, 0-9, '_' or '-', starting with a letter.`,
      });
    }
  });

  return {
    ok: errors.length === 0,
    errors,
  };
}

export function assertValidPoolConfig(config: PoolConfig): PoolConfig {
  const result = validatePoolConfig(config);
  if (!result.ok) {
    throw new InvalidInputError(
      "config",
      result.errors.map((error) => `${error.path}: ${error.message}`).join("; "),
    );
  }
  return config;
}

export function resolvePoolConfigFromEnv(env: PoolEnvironment = process.env): PoolConfig {
  const input: PoolConfigInput = {
    author: {
      name: env.FUNCPOOL_AUTHOR_NAME ?? env.USER ?? env.USERNAME ?? "",
      email: env.FUNCPOOL_AUTHOR_EMAIL ?? "",
    },
  };
  if (env.FUNCPOOL_DIRECTORY) {
    input.poolDirectory = env.FUNCPOOL_DIRECTORY;
  }
  const languages = parseLanguageList(env.FUNCPOOL_LANGUAGES);
  if (languages.length > 0) {
    input.languages = languages;
  }
  return normalizePoolConfig(input);
}

export * from "./canonicalizer.js";
export * from "./content-hash.js";
export * from "./denormalizer.js";
export * from "./dependency-graph.js";
export * from "./dependency-resolver.js";
export * from "./function-pool.js";
export * from "./language-codes.js";
export * from "./logger.js";
export * from "./pool-config.js";
export * from "./pool-errors.js";
export * from "./pool-references.js";
export * from "./pool-storage.js";
export * from "./pool-types.js";
export * from "./reserved-identifiers.js";
export * from "./schema-migration.js";
export * from "./source-adapter.js";

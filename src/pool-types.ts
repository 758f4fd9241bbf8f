export const CURRENT_SCHEMA_VERSION = 1;
export const LEGACY_SCHEMA_VERSION = 0;

export type SchemaGeneration = "current" | "legacy" | "not_found";

export interface FunctionMetadata {
  created: string;
  name?: string;
  email?: string;
  parent?: string;
  checks?: string[];
}

export interface ObjectFile {
  schema_version: typeof CURRENT_SCHEMA_VERSION;
  hash: string;
  hash_algorithm: "sha256";
  normalized_code: string;
  encoding: "none";
  metadata: FunctionMetadata;
}

export interface MappingFile {
  docstring: string;
  name_mapping: Record<string, string>;
  alias_mapping: Record<string, string>;
  comment: string;
}

export interface CanonicalFunctionRecord {
  hash: string;
  schemaVersion: number;
  normalizedCode: string;
  metadata: FunctionMetadata;
}

export interface MappingContent {
  docstring: string;
  nameMapping: Record<string, string>;
  aliasMapping: Record<string, string>;
  comment: string;
}

export interface LocalizationMapping extends MappingContent {
  hash: string;
  language: string;
  mappingHash: string;
}

export interface MappingSummary {
  mappingHash: string;
  comment: string;
}

export type MappingSelection =
  | { status: "selected"; mapping: LocalizationMapping }
  | { status: "ambiguous"; hash: string; language: string; candidates: MappingSummary[] }
  | { status: "not_found"; hash: string; language: string; reason: "language" | "mapping" };

export type PoolDiagnosticCode =
  | "object_missing"
  | "object_unreadable"
  | "schema_version_mismatch"
  | "missing_field"
  | "invalid_field"
  | "hash_mismatch"
  | "no_languages"
  | "no_mappings"
  | "mapping_unreadable"
  | "mapping_invalid";

export interface PoolDiagnostic {
  code: PoolDiagnosticCode;
  severity: "error" | "warning";
  message: string;
  details?: Record<string, unknown>;
}

export interface PoolValidationResult {
  ok: boolean;
  hash: string;
  errors: PoolDiagnostic[];
}

import { createHash } from "node:crypto";

export const HASH_ALGORITHM = "sha256";

const HASH_PATTERN = /^[0-9a-f]{64}$/;

export type CanonicalJsonValue =
  | string
  | number
  | boolean
  | null
  | CanonicalJsonValue[]
  | { [key: string]: CanonicalJsonValue };

export interface MappingHashInput {
  docstring: string;
  name_mapping: Record<string, string>;
  alias_mapping: Record<string, string>;
  comment: string;
}

export function computeSha256(text: string): string {
  return createHash(HASH_ALGORITHM).update(text, "utf8").digest("hex");
}

export function computeIdentityHash(canonicalWithoutDocstring: string): string {
  return computeSha256(canonicalWithoutDocstring);
}

export function computeMappingHash(mapping: MappingHashInput): string {
  return computeSha256(
    canonicalJson({
      docstring: mapping.docstring,
      name_mapping: mapping.name_mapping,
      alias_mapping: mapping.alias_mapping,
      comment: mapping.comment,
    }),
  );
}

export function canonicalJson(value: CanonicalJsonValue): string {
  if (value === null || typeof value !== "object") {
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new Error(`Cannot encode non-finite number ${value} as canonical JSON.`);
    }
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(",")}]`;
  }

  const keys = Object.keys(value).sort(compareCodeUnits);
  return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`).join(",")}}`;
}

export function isValidHash(value: unknown): value is string {
  return typeof value === "string" && HASH_PATTERN.test(value);
}

export function splitHashPath(hash: string): [string, string] {
  return [hash.slice(0, 2), hash.slice(2)];
}

function compareCodeUnits(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

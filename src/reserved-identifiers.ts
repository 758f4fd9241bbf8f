import { readFileSync } from "node:fs";

interface ReservedIdentifierTable {
  version: number;
  ecmascript: string[];
  host: string[];
}

// Resolves to <package>/data from both src/ and dist/.
const TABLE_URL = new URL("../data/reserved-identifiers.json", import.meta.url);

const table = loadReservedIdentifierTable();

export const RESERVED_IDENTIFIERS_VERSION = table.version;

const RESERVED: ReadonlySet<string> = new Set([...table.ecmascript, ...table.host]);

export function isReservedIdentifier(name: string): boolean {
  return RESERVED.has(name);
}

function loadReservedIdentifierTable(): ReservedIdentifierTable {
  const parsed: unknown = JSON.parse(readFileSync(TABLE_URL, "utf8"));
  if (!isRecord(parsed)) {
    throw new Error("reserved identifier table must be an object");
  }

  const { version, ecmascript, host } = parsed;
  if (typeof version !== "number" || !Number.isInteger(version) || version < 1) {
    throw new Error("reserved identifier table version must be an integer >= 1");
  }

  return {
    version,
    ecmascript: requireNameList(ecmascript, "ecmascript"),
    host: requireNameList(host, "host"),
  };
}

function requireNameList(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === "string" && entry.length > 0)) {
    throw new Error(`reserved identifier table ${field} must be an array of non-empty strings`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

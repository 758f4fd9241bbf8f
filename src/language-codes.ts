export const DEFAULT_LANGUAGE = "eng";

export const LANGUAGE_CODE_MIN_LENGTH = 3;
export const LANGUAGE_CODE_MAX_LENGTH = 256;

const LANGUAGE_CODE_PATTERN = /^[a-z][a-z0-9_-]*$/;

export interface LanguageResolution {
  requested: string[];
  effective?: string;
  fallbackApplied: boolean;
  fallbackReason: "preferred" | "fallback" | "unavailable";
}

export function isValidLanguageCode(value: unknown): value is string {
  return (
    typeof value === "string" &&
    value.length >= LANGUAGE_CODE_MIN_LENGTH &&
    value.length <= LANGUAGE_CODE_MAX_LENGTH &&
    LANGUAGE_CODE_PATTERN.test(value)
  );
}

export function normalizeLanguageCode(input: string | undefined | null): string {
  const raw = (input ?? "").trim().toLowerCase();
  return raw.length > 0 ? raw : DEFAULT_LANGUAGE;
}

export function parseLanguageList(input: string | undefined | null): string[] {
  const codes = (input ?? "")
    .split(/[\s,]+/)
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0);
  return [...new Set(codes)];
}

// Picks the first preferred language that has at least one mapping.
export function resolveLanguagePreference(available: readonly string[], preferred: readonly string[]): LanguageResolution {
  const requested = preferred.slice();
  const availableSet = new Set(available);
  const index = requested.findIndex((language) => availableSet.has(language));

  if (index === 0) {
    return { requested, effective: requested[0], fallbackApplied: false, fallbackReason: "preferred" };
  }
  if (index > 0) {
    return { requested, effective: requested[index], fallbackApplied: true, fallbackReason: "fallback" };
  }
  return { requested, fallbackApplied: false, fallbackReason: "unavailable" };
}

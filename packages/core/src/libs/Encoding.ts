import { SerializationError } from "../errors";

/**
 * Canonical JSON encoding for deterministic hashing.
 * Keys are sorted alphabetically, no whitespace, no undefined values.
 * Non-finite numbers would silently become null, so they are rejected.
 */
export function canonicalEncode(value: unknown): string {
  return JSON.stringify(value, (key, current: unknown) => {
    if (typeof current === "number" && !Number.isFinite(current)) {
      throw new SerializationError(
        `Cannot encode non-finite number at '${key}': ${current}`
      );
    }
    if (isPlainRecord(current)) {
      const sorted: Record<string, unknown> = {};
      for (const k of Object.keys(current).sort()) {
        if (current[k] !== undefined) sorted[k] = current[k];
      }
      return sorted;
    }
    return current;
  });
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

import { createHash } from "node:crypto";

/**
 * Deterministic JSON-like serialization for hashing.
 * - Sorts object keys.
 * - Treats `undefined` and functions as nullish literals so hashing is total.
 * - Not resilient to cycles (syntax trees and references are trees).
 */
export const stableSerialize = (value: unknown): string => serialize(value);

export const stableHash = (value: unknown): string =>
  createHash("sha256").update(stableSerialize(value)).digest("hex");

const serialize = (value: unknown): string => {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? String(value) : `"${String(value)}"`;
    case "boolean":
      return value ? "true" : "false";
    case "undefined":
      return "null";
    case "function":
      return '"<fn>"';
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) return serializeArray(value);
      if (value instanceof Uint8Array) return serializeArray(Array.from(value));
      return serializeObject(value);
    default:
      return JSON.stringify(String(value));
  }
};

const serializeArray = (arr: readonly unknown[]): string =>
  `[${arr.map((entry) => serialize(entry)).join(",")}]`;

const serializeObject = (obj: object): string => {
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const parts = entries.map(([key, entry]) => `${JSON.stringify(key)}:${serialize(entry)}`);
  return `{${parts.join(",")}}`;
};

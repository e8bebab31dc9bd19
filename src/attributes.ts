import type { Attributes, JsonValue } from "./model.js";

// Every getter here is total: a missing key or an unexpected JSON type yields a default.

const scalarText = (value: JsonValue): string => {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null) return "";
  return JSON.stringify(value);
};

const valueOf = (attrs: Attributes | undefined, key: string): JsonValue | undefined => {
  if (!attrs || !Object.prototype.hasOwnProperty.call(attrs, key)) return undefined;
  return attrs[key];
};

export const asString = (attrs: Attributes | undefined, key: string): string => {
  const value = valueOf(attrs, key);
  if (value === undefined) return "";
  return scalarText(value);
};

export const asBool = (attrs: Attributes | undefined, key: string): boolean => valueOf(attrs, key) === true;

export const asStringSequence = (attrs: Attributes | undefined, key: string): string[] => {
  const value = valueOf(attrs, key);
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map((item) => scalarText(item));
  }
  const text = scalarText(value);
  return text.length > 0 ? [text] : [];
};

export const asRawValue = (attrs: Attributes | undefined, key: string): JsonValue | undefined => valueOf(attrs, key);

export const asNumber = (attrs: Attributes | undefined, key: string): number | undefined => {
  const value = valueOf(attrs, key);
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return undefined;
};

export const firstNonEmpty = (...values: string[]) => {
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return "";
};

import { z } from "zod";
import { ParseError } from "./errors.js";
import { logger } from "./logger.js";
import {
  isJsonObject,
  type Document,
  type DocumentShape,
  type JsonObject,
  type JsonValue,
  type Relationship,
  type Resource,
  type ResourceRef
} from "./model.js";

export type ResponseBytes = string | Uint8Array | ArrayBuffer;

// JSON.parse output is JSON already; only the identifiers need checking, and a bad one reads as "".
const resourceSchema = z.object({
  type: z.string().catch(""),
  id: z.union([z.string(), z.number().transform((value) => String(value))]).catch(""),
  attributes: z.unknown(),
  relationships: z.unknown()
});

const decoder = new TextDecoder("utf-8");

const toText = (bytes: ResponseBytes) => {
  if (typeof bytes === "string") return bytes;
  return decoder.decode(bytes);
};

const toStrictRef = (value: JsonValue): ResourceRef | undefined => {
  if (!isJsonObject(value)) return undefined;
  const { type, id } = value;
  if (typeof type !== "string" || typeof id !== "string" || id.length === 0) return undefined;
  return { type, id };
};

export const decodeRelationship = (member: JsonValue): Relationship => {
  if (!isJsonObject(member) || !("data" in member)) {
    return { data: undefined, raw: undefined };
  }

  const raw = member.data;
  if (raw === null) {
    return { data: null, raw };
  }

  if (Array.isArray(raw)) {
    const refs: ResourceRef[] = [];
    for (const entry of raw) {
      const ref = toStrictRef(entry);
      if (!ref) return { data: "irregular", raw };
      refs.push(ref);
    }
    return { data: refs, raw };
  }

  return { data: toStrictRef(raw) ?? "irregular", raw };
};

const decodeMembers = (value: JsonObject): Resource => {
  const parsed = resourceSchema.parse(value);

  const relationships: Record<string, Relationship> = {};
  const members = parsed.relationships;
  if (isJsonObject(members)) {
    for (const [name, member] of Object.entries(members)) {
      relationships[name] = decodeRelationship(member);
    }
  }

  return {
    type: parsed.type,
    id: parsed.id,
    attributes: isJsonObject(parsed.attributes) ? parsed.attributes : {},
    relationships
  };
};

const decodePrimary = (value: JsonValue, path: string): Resource => {
  if (!isJsonObject(value)) {
    throw new ParseError(`Invalid resource object at ${path}`);
  }
  return decodeMembers(value);
};

const decodePrimaryArray = (values: JsonValue[]) => values.map((value, index) => decodePrimary(value, `data[${index}]`));

/** Side-loaded entries nothing could point at (no type or id) are dropped. */
const decodeIncluded = (values: JsonValue[]) => {
  const included: Resource[] = [];
  values.forEach((value, index) => {
    const resource = isJsonObject(value) ? decodeMembers(value) : undefined;
    if (!resource || !resource.type || !resource.id) {
      logger.debug({ path: `included[${index}]` }, "Skipping unusable included resource");
      return;
    }
    included.push(resource);
  });
  return included;
};

const parseJson = (text: string): JsonValue => {
  let json: JsonValue;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return json;
};

/**
 * Decodes a JSON:API response body.
 *
 * `shape` states what the caller expects; `"auto"` accepts either form.
 * Unknown top-level members are ignored. `included` is kept in wire order,
 * duplicates and all.
 */
export const parseDocument = (bytes: ResponseBytes, shape: DocumentShape | "auto" = "auto"): Document => {
  const root = parseJson(toText(bytes));
  if (!isJsonObject(root)) {
    throw new ParseError("Response is not a JSON object");
  }
  if (!("data" in root)) {
    throw new ParseError("Response has no data member");
  }

  const includedValue = root.included;
  let included: Resource[] = [];
  if (includedValue !== undefined && includedValue !== null) {
    if (!Array.isArray(includedValue)) {
      throw new ParseError("Response included member must be an array");
    }
    included = decodeIncluded(includedValue);
  }

  const meta: JsonObject | undefined = isJsonObject(root.meta) ? root.meta : undefined;
  const links: JsonObject | undefined = isJsonObject(root.links) ? root.links : undefined;
  const data = root.data;

  if (Array.isArray(data)) {
    if (shape === "single") {
      throw new ParseError("Expected a single resource but data is an array");
    }
    return { shape: "collection", primary: decodePrimaryArray(data), included, meta, links };
  }

  if (isJsonObject(data)) {
    if (shape === "collection") {
      throw new ParseError("Expected a collection but data is an object");
    }
    return { shape: "single", primary: decodePrimary(data, "data"), included, meta, links };
  }

  throw new ParseError("Response data must be an object or an array");
};

export const primaryResources = (document: Document): readonly Resource[] =>
  document.shape === "single" ? [document.primary] : document.primary;

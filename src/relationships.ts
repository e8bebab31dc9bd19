import { isJsonObject, type JsonValue, type RelationshipState, type Resource, type ResourceRef } from "./model.js";
import type { ResourceIndex } from "./resourceIndex.js";

const ABSENT: RelationshipState = { kind: "absent" };
const NULL: RelationshipState = { kind: "null" };

const identifierText = (value: JsonValue | undefined) => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
};

const entriesOf = (raw: JsonValue | undefined): JsonValue[] => {
  if (Array.isArray(raw)) return raw;
  if (isJsonObject(raw)) return [raw];
  return [];
};

/**
 * Walks a raw relationship `data` value and keeps every entry with a usable
 * `type` and `id`. Anything else is skipped.
 */
export const extractRefs = (raw: JsonValue | undefined): ResourceRef[] => {
  const refs: ResourceRef[] = [];
  for (const entry of entriesOf(raw)) {
    if (!isJsonObject(entry)) continue;
    const id = identifierText(entry.id);
    const type = entry.type;
    if (!id || typeof type !== "string") continue;
    refs.push({ type, id });
  }
  return refs;
};

/** Id-only variant of {@link extractRefs}; entries without a `type` still count. */
export const extractIds = (raw: JsonValue | undefined): string[] =>
  entriesOf(raw)
    .map((entry) => (isJsonObject(entry) ? identifierText(entry.id) : ""))
    .filter((id) => id.length > 0);

export const resolve = (resource: Resource, name: string): RelationshipState => {
  if (!Object.prototype.hasOwnProperty.call(resource.relationships, name)) return ABSENT;
  const relationship = resource.relationships[name];
  if (!relationship) return ABSENT;

  const { data, raw } = relationship;
  if (data === undefined) return ABSENT;
  if (data === null) return NULL;

  if (data === "irregular") {
    const refs = extractRefs(raw);
    if (Array.isArray(raw)) return { kind: "to-many", refs };
    const [first] = refs;
    return first ? { kind: "to-one", ref: first } : ABSENT;
  }

  if (Array.isArray(data)) return { kind: "to-many", refs: data };
  return { kind: "to-one", ref: data };
};

export const refsOf = (state: RelationshipState): readonly ResourceRef[] => {
  switch (state.kind) {
    case "to-one":
      return [state.ref];
    case "to-many":
      return state.refs;
    default:
      return [];
  }
};

export const relationshipIds = (resource: Resource, name: string) => refsOf(resolve(resource, name)).map((ref) => ref.id);

export const relationshipId = (resource: Resource, name: string) => relationshipIds(resource, name)[0] ?? "";

export type RelatedEntry = {
  ref: ResourceRef;
  resource?: Resource;
};

/** Joins a ref against the index; a miss keeps the ref with no body. */
export const related = (index: ResourceIndex, ref: ResourceRef): RelatedEntry => {
  const resource = index.get(ref);
  return resource ? { ref, resource } : { ref };
};

export const resolveRelated = (index: ResourceIndex, resource: Resource, name: string): RelatedEntry[] =>
  refsOf(resolve(resource, name)).map((ref) => related(index, ref));

export const resolveRelatedOne = (index: ResourceIndex, resource: Resource, name: string): RelatedEntry | undefined =>
  resolveRelated(index, resource, name)[0];

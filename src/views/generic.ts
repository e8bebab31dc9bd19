import { asString, firstNonEmpty } from "../attributes.js";
import type { Resource } from "../model.js";
import { formatRef, formatValue, type Column, type DetailSection } from "../output.js";
import { related, resolve, type RelatedEntry } from "../relationships.js";
import type { ResourceIndex } from "../resourceIndex.js";
import type { ResourceView } from "./types.js";

const MAX_LIST_ATTRIBUTES = 6;

type GenericRelated = {
  type: string;
  id: string;
  name?: string;
};

const displayName = (resource: Resource | undefined) =>
  resource
    ? firstNonEmpty(
        asString(resource.attributes, "name"),
        asString(resource.attributes, "company-name"),
        asString(resource.attributes, "title")
      )
    : "";

const toGenericRelated = (entry: RelatedEntry): GenericRelated => {
  const name = displayName(entry.resource);
  return name ? { type: entry.ref.type, id: entry.ref.id, name } : { type: entry.ref.type, id: entry.ref.id };
};

const relatedLabel = (entry: GenericRelated) => {
  const ref = formatRef(entry);
  return entry.name ? `${entry.name} (${ref})` : ref;
};

const genericRelationships = (resource: Resource, index: ResourceIndex) => {
  const relationships: Record<string, GenericRelated | GenericRelated[] | null> = {};
  for (const name of Object.keys(resource.relationships)) {
    const state = resolve(resource, name);
    if (state.kind === "absent") continue;
    if (state.kind === "null") {
      relationships[name] = null;
    } else if (state.kind === "to-one") {
      relationships[name] = toGenericRelated(related(index, state.ref));
    } else {
      relationships[name] = state.refs.map((ref) => toGenericRelated(related(index, ref)));
    }
  }
  return relationships;
};

/** Fallback view for resource types without a dedicated one. */
export const genericView = (type: string): ResourceView => ({
  type,
  query: {},
  list: (resources) => {
    const keys: string[] = [];
    for (const resource of resources) {
      for (const key of Object.keys(resource.attributes)) {
        if (keys.length >= MAX_LIST_ATTRIBUTES) break;
        if (!keys.includes(key)) keys.push(key);
      }
    }

    const columns: Column[] = [{ header: "ID" }, ...keys.map((key) => ({ header: key.toUpperCase(), maxWidth: 30 }))];
    return {
      columns,
      rows: resources.map((resource) => [resource.id, ...keys.map((key) => asString(resource.attributes, key))]),
      json: resources.map((resource) => ({ id: resource.id, type: resource.type, attributes: resource.attributes }))
    };
  },
  show: (resource, index) => {
    const relationships = genericRelationships(resource, index);
    const sections: DetailSection[] = [
      {
        fields: [
          ["ID", resource.id],
          ["Type", resource.type]
        ]
      },
      {
        title: "Attributes",
        fields: Object.entries(resource.attributes).map(([key, value]): [string, string] => [key, formatValue(value)])
      },
      {
        title: "Relationships",
        fields: Object.entries(relationships).map(([name, value]): [string, string] => {
          if (value === null) return [name, "none"];
          if (Array.isArray(value)) return [name, value.length > 0 ? value.map(relatedLabel).join(", ") : "(none)"];
          return [name, relatedLabel(value)];
        })
      }
    ];

    return {
      sections,
      json: {
        id: resource.id,
        type: resource.type,
        attributes: resource.attributes,
        relationships
      }
    };
  }
});

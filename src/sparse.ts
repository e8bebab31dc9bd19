import { UsageError } from "./errors.js";
import { resourceKey, type Attributes, type Document, type Resource, type ResourceRef } from "./model.js";
import { resolve } from "./relationships.js";
import { buildIndex } from "./resourceIndex.js";

export type SparseSelection = {
  fields: Record<string, string[]>;
  include: string[];
  forced: boolean;
};

export type SparseOptions = {
  fields?: string[];
  include?: string[];
  sparse?: boolean;
};

export type ProjectedRelationship = ResourceRef | ResourceRef[] | null;

export type ProjectedResource = {
  id: string;
  type: string;
  attributes: Attributes;
  relationships: Record<string, ProjectedRelationship>;
};

export type SparseSingle = ProjectedResource & {
  included?: Record<string, ProjectedResource>;
};

export type SparseCollection = {
  data: ProjectedResource[];
  included?: Record<string, ProjectedResource>;
};

export type SparseProjection = SparseSingle | SparseCollection;

const splitCsv = (raw: string) =>
  raw
    .split(",")
    .map((part) => part.trim())
    .filter(Boolean);

/**
 * Reads `--fields type=a,b` (repeatable), `--include a,b.c` (repeatable) and
 * `--sparse` into one selection.
 */
export const parseSparseSelection = (options: SparseOptions): SparseSelection => {
  const fields: Record<string, string[]> = {};
  for (const entry of options.fields ?? []) {
    const separator = entry.indexOf("=");
    const type = separator > 0 ? entry.slice(0, separator).trim() : "";
    if (!type) {
      throw new UsageError(`Invalid --fields value "${entry}": expected <type>=<field>[,<field>...]`);
    }
    const existing = fields[type] ?? [];
    for (const field of splitCsv(entry.slice(separator + 1))) {
      if (!existing.includes(field)) existing.push(field);
    }
    fields[type] = existing;
  }

  const include: string[] = [];
  for (const entry of options.include ?? []) {
    for (const path of splitCsv(entry)) {
      if (!include.includes(path)) include.push(path);
    }
  }

  return { fields, include, forced: options.sparse ?? false };
};

export const isSparseRequested = (selection: SparseSelection) =>
  selection.forced || selection.include.length > 0 || Object.keys(selection.fields).length > 0;

export const selectionQuery = (selection: SparseSelection): Record<string, string> => {
  const query: Record<string, string> = {};
  for (const [type, fieldNames] of Object.entries(selection.fields)) {
    query[`fields[${type}]`] = fieldNames.join(",");
  }
  if (selection.include.length > 0) {
    query.include = selection.include.join(",");
  }
  return query;
};

export const projectResource = (resource: Resource): ProjectedResource => {
  const relationships: Record<string, ProjectedRelationship> = {};
  for (const name of Object.keys(resource.relationships)) {
    const state = resolve(resource, name);
    switch (state.kind) {
      case "absent":
        break;
      case "null":
        relationships[name] = null;
        break;
      case "to-one":
        relationships[name] = { type: state.ref.type, id: state.ref.id };
        break;
      case "to-many":
        relationships[name] = state.refs.map((ref) => ({ type: ref.type, id: ref.id }));
        break;
    }
  }

  return {
    id: resource.id,
    type: resource.type,
    attributes: resource.attributes,
    relationships
  };
};

const projectIncluded = (document: Document) => {
  if (document.included.length === 0) return undefined;
  const included: Record<string, ProjectedResource> = {};
  for (const resource of buildIndex(document.included)) {
    included[resourceKey(resource.type, resource.id)] = projectResource(resource);
  }
  return included;
};

/**
 * Echoes a parsed document in a generic shape. The server already limited
 * attributes and relationships to the selection, so nothing is filtered here.
 */
export const projectDocument = (document: Document): SparseProjection => {
  const included = projectIncluded(document);

  if (document.shape === "single") {
    const projected: SparseSingle = projectResource(document.primary);
    return included ? { ...projected, included } : projected;
  }

  const data = document.primary.map((resource) => projectResource(resource));
  return included ? { data, included } : { data };
};

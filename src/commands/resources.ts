import { z } from "zod";
import type { ApiClient } from "../apiClient.js";
import { parseDocument } from "../document.js";
import { ParseError, UsageError } from "../errors.js";
import { logger } from "../logger.js";
import type { Document, DocumentShape, JsonObject, JsonValue, ResourceRef } from "../model.js";
import { renderDetail, renderJson, renderSparseText, renderTable, type Io } from "../output.js";
import { buildIndex } from "../resourceIndex.js";
import { isSparseRequested, parseSparseSelection, projectDocument, selectionQuery } from "../sparse.js";
import { viewFor } from "../views/index.js";

export type CommandContext = {
  client: ApiClient;
  io: Io;
  apiPrefix: string;
};

const outputSchema = z.object({
  json: z.boolean().optional().default(false),
  omitNull: z.boolean().optional().default(false)
});

const sparseSchema = z.object({
  fields: z.array(z.string()).optional().default([]),
  include: z.array(z.string()).optional().default([]),
  sparse: z.boolean().optional().default(false)
});

export const listOptionsSchema = outputSchema.merge(sparseSchema).extend({
  limit: z.coerce.number().int().positive().optional(),
  offset: z.coerce.number().int().min(0).optional(),
  sort: z.string().optional(),
  filter: z.array(z.string()).optional().default([])
});

export const showOptionsSchema = outputSchema.merge(sparseSchema);

export const writeOptionsSchema = outputSchema.extend({
  attr: z.array(z.string()).optional().default([]),
  rel: z.array(z.string()).optional().default([])
});

export const deleteOptionsSchema = z.object({
  confirm: z.boolean().optional().default(false)
});

export type ListOptions = z.input<typeof listOptionsSchema>;
export type ShowOptions = z.input<typeof showOptionsSchema>;
export type WriteOptions = z.input<typeof writeOptionsSchema>;
export type DeleteOptions = z.input<typeof deleteOptionsSchema>;

const resourceTypePattern = /^[a-z0-9][a-z0-9-]*$/i;

const parseOptions = <T extends z.ZodTypeAny>(schema: T, options: unknown): z.output<T> => {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const flag = issue?.path.join(".") ?? "options";
    throw new UsageError(`Invalid --${flag}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
};

export const resourcePath = (apiPrefix: string, type: string, id?: string) => {
  if (!resourceTypePattern.test(type)) {
    throw new UsageError(`Invalid resource type "${type}"`);
  }
  const base = `${apiPrefix.replace(/\/+$/, "")}/${type}`;
  if (id === undefined) return base;
  const trimmed = id.trim();
  if (!trimmed) {
    throw new UsageError(`A ${type} id is required`);
  }
  return `${base}/${encodeURIComponent(trimmed)}`;
};

const splitKeyValue = (entry: string, flag: string) => {
  const separator = entry.indexOf("=");
  const key = separator > 0 ? entry.slice(0, separator).trim() : "";
  if (!key) {
    throw new UsageError(`Invalid --${flag} value "${entry}": expected <name>=<value>`);
  }
  return { key, value: entry.slice(separator + 1) };
};

/** Flag values are read as JSON when they parse as JSON, otherwise as plain strings. */
export const parseFlagValue = (text: string): JsonValue => {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

export const parseFilters = (entries: string[]) => {
  const query: Record<string, string> = {};
  for (const entry of entries) {
    const { key, value } = splitKeyValue(entry, "filter");
    query[`filter[${key}]`] = value.trim();
  }
  return query;
};

export const parseAttributes = (entries: string[]): JsonObject => {
  const attributes: JsonObject = {};
  for (const entry of entries) {
    const { key, value } = splitKeyValue(entry, "attr");
    attributes[key] = parseFlagValue(value);
  }
  return attributes;
};

const parseRef = (text: string, entry: string): ResourceRef => {
  const separator = text.indexOf(":");
  const type = separator > 0 ? text.slice(0, separator).trim() : "";
  const id = separator > 0 ? text.slice(separator + 1).trim() : "";
  if (!type || !id) {
    throw new UsageError(`Invalid --rel value "${entry}": expected <name>=<type>:<id>[,<type>:<id>...]`);
  }
  return { type, id };
};

/**
 * `name=type:id` sets a to-one, `name=type:id,type:id` or `name=[]` a to-many,
 * and `name=` clears a to-one.
 */
export const parseRelationships = (entries: string[]) => {
  const relationships: Record<string, { data: JsonValue }> = {};
  for (const entry of entries) {
    const { key, value } = splitKeyValue(entry, "rel");
    const trimmed = value.trim();
    if (!trimmed) {
      relationships[key] = { data: null };
      continue;
    }
    if (trimmed === "[]") {
      relationships[key] = { data: [] };
      continue;
    }
    const refs = trimmed.split(",").map((part) => parseRef(part.trim(), entry));
    const data = refs.map((ref) => ({ type: ref.type, id: ref.id }));
    relationships[key] = { data: trimmed.includes(",") ? data : data[0] ?? null };
  }
  return relationships;
};

const readDocument = (ctx: CommandContext, body: string, shape: DocumentShape): Document => {
  try {
    return parseDocument(body, shape);
  } catch (err) {
    if (err instanceof ParseError && body.length > 0) {
      ctx.io.stderr.write(`${body}\n`);
    }
    throw err;
  }
};

const writeSparse = (ctx: CommandContext, document: Document, json: boolean) => {
  const projection = projectDocument(document);
  ctx.io.stdout.write(json ? renderJson(projection) : renderSparseText(projection));
};

const writeSingle = (
  ctx: CommandContext,
  type: string,
  document: Document,
  options: { json: boolean; omitNull: boolean }
) => {
  if (document.shape !== "single") {
    throw new ParseError("Expected a single resource but data is an array");
  }
  const output = viewFor(type).show(document.primary, buildIndex(document.included));
  ctx.io.stdout.write(
    options.json ? renderJson(output.json, { omitNull: options.omitNull }) : renderDetail(output.sections)
  );
};

export const runList = async (ctx: CommandContext, type: string, rawOptions: ListOptions) => {
  const options = parseOptions(listOptionsSchema, rawOptions);
  const selection = parseSparseSelection(options);
  const sparse = isSparseRequested(selection);
  const view = viewFor(type);

  const query: Record<string, string> = {
    ...(sparse ? selectionQuery(selection) : view.query),
    ...parseFilters(options.filter)
  };
  if (options.sort) query.sort = options.sort;
  if (options.limit !== undefined) query["page[limit]"] = String(options.limit);
  if (options.offset !== undefined) query["page[offset]"] = String(options.offset);

  const response = await ctx.client.get(resourcePath(ctx.apiPrefix, type), { query });
  const document = readDocument(ctx, response.body, "collection");
  logger.debug(
    { type, count: document.shape === "collection" ? document.primary.length : 1, sparse },
    "Listed resources"
  );

  if (sparse) {
    writeSparse(ctx, document, options.json);
    return;
  }
  if (document.shape !== "collection") return;

  const output = view.list(document.primary, buildIndex(document.included));
  if (options.json) {
    ctx.io.stdout.write(renderJson(output.json, { omitNull: options.omitNull }));
    return;
  }
  if (output.rows.length === 0) {
    ctx.io.stdout.write(`No ${type} found.\n`);
    return;
  }
  ctx.io.stdout.write(renderTable(output.columns, output.rows));
};

export const runShow = async (ctx: CommandContext, type: string, id: string, rawOptions: ShowOptions) => {
  const options = parseOptions(showOptionsSchema, rawOptions);
  const selection = parseSparseSelection(options);
  const sparse = isSparseRequested(selection);
  const query = sparse ? selectionQuery(selection) : viewFor(type).query;

  const response = await ctx.client.get(resourcePath(ctx.apiPrefix, type, id), { query });
  const document = readDocument(ctx, response.body, "single");

  if (sparse) {
    writeSparse(ctx, document, options.json);
    return;
  }
  writeSingle(ctx, type, document, options);
};

export const runCreate = async (ctx: CommandContext, type: string, rawOptions: WriteOptions) => {
  const options = parseOptions(writeOptionsSchema, rawOptions);
  const attributes = parseAttributes(options.attr);
  const relationships = parseRelationships(options.rel);

  const data: JsonObject = { type, attributes };
  if (Object.keys(relationships).length > 0) data.relationships = relationships;

  const response = await ctx.client.post(resourcePath(ctx.apiPrefix, type), { data });
  const document = readDocument(ctx, response.body, "single");
  writeSingle(ctx, type, document, options);
};

export const runUpdate = async (ctx: CommandContext, type: string, id: string, rawOptions: WriteOptions) => {
  const options = parseOptions(writeOptionsSchema, rawOptions);
  const attributes = parseAttributes(options.attr);
  const relationships = parseRelationships(options.rel);
  if (Object.keys(attributes).length === 0 && Object.keys(relationships).length === 0) {
    throw new UsageError("No changes given: pass at least one --attr or --rel");
  }

  const path = resourcePath(ctx.apiPrefix, type, id);
  const data: JsonObject = { type, id: id.trim() };
  if (Object.keys(attributes).length > 0) data.attributes = attributes;
  if (Object.keys(relationships).length > 0) data.relationships = relationships;

  const response = await ctx.client.patch(path, { data });
  const document = readDocument(ctx, response.body, "single");
  writeSingle(ctx, type, document, options);
};

export const runDelete = async (ctx: CommandContext, type: string, id: string, rawOptions: DeleteOptions) => {
  const options = parseOptions(deleteOptionsSchema, rawOptions);
  const path = resourcePath(ctx.apiPrefix, type, id);
  if (!options.confirm) {
    throw new UsageError(`Refusing to delete ${type} ${id.trim()} without --confirm`);
  }

  await ctx.client.delete(path);
  ctx.io.stdout.write(`Deleted ${type} ${id.trim()}\n`);
};

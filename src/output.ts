import type { JsonValue, ResourceRef } from "./model.js";
import type { ProjectedRelationship, ProjectedResource, SparseProjection } from "./sparse.js";

export type Io = {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
};

export const processIo: Io = {
  stdout: process.stdout,
  stderr: process.stderr
};

export type Column = {
  header: string;
  maxWidth?: number;
};

export type DetailSection = {
  title?: string;
  fields: Array<[label: string, value: string]>;
};

const GUTTER = "  ";

/** Drops `null` members from objects, recursively. Array slots are kept. */
export const stripNulls = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => stripNulls(item));
  }
  if (typeof value === "object" && value !== null) {
    const next: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === null) continue;
      next[key] = stripNulls(item);
    }
    return next;
  }
  return value;
};

export const renderJson = (value: unknown, options?: { omitNull?: boolean }) =>
  `${JSON.stringify(options?.omitNull ? stripNulls(value) : value, null, 2)}\n`;

export const truncate = (value: string, maxWidth?: number) => {
  if (!maxWidth || value.length <= maxWidth) return value;
  if (maxWidth <= 1) return value.slice(0, maxWidth);
  return `${value.slice(0, maxWidth - 1)}…`;
};

export const renderTable = (columns: Column[], rows: string[][]) => {
  const cells = rows.map((row) => columns.map((column, index) => truncate(row[index] ?? "", column.maxWidth)));
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...cells.map((row) => (row[index] ?? "").length))
  );

  const formatLine = (values: string[]) =>
    values
      .map((value, index) => (index === values.length - 1 ? value : value.padEnd(widths[index] ?? 0)))
      .join(GUTTER)
      .trimEnd();

  const lines = [formatLine(columns.map((column) => column.header)), ...cells.map((row) => formatLine(row))];
  return `${lines.join("\n")}\n`;
};

export const renderDetail = (sections: DetailSection[]) => {
  const blocks = sections
    .filter((section) => section.fields.length > 0)
    .map((section) => {
      if (!section.title) {
        return section.fields.map(([label, value]) => `${label}: ${value}`).join("\n");
      }
      const body = section.fields.map(([label, value]) => `${GUTTER}${label}: ${value}`).join("\n");
      return `${section.title}:\n${body}`;
    });
  return blocks.length > 0 ? `${blocks.join("\n\n")}\n` : "";
};

export const fieldIf = (label: string, value: string): Array<[string, string]> => (value ? [[label, value]] : []);

export const formatBool = (value: boolean) => (value ? "yes" : "no");

export const formatValue = (value: JsonValue | undefined): string => {
  if (value === undefined) return "";
  if (value === null) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
};

export const formatRef = (ref: ResourceRef) => `${ref.type}:${ref.id}`;

export const formatLabelWithId = (name: string, id: string) => {
  if (!id) return "";
  return name ? `${name} (${id})` : id;
};

const formatRelationship = (value: ProjectedRelationship) => {
  if (value === null) return "null";
  if (Array.isArray(value)) return value.length > 0 ? value.map(formatRef).join(", ") : "(none)";
  return formatRef(value);
};

const projectedSections = (resource: ProjectedResource): DetailSection[] => [
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
    fields: Object.entries(resource.relationships).map(([key, value]): [string, string] => [key, formatRelationship(value)])
  }
];

const renderIncluded = (included: Record<string, ProjectedResource>) => {
  const lines = ["Included:"];
  for (const [key, resource] of Object.entries(included)) {
    lines.push(`${GUTTER}${key}`);
    for (const [name, value] of Object.entries(resource.attributes)) {
      lines.push(`${GUTTER}${GUTTER}${name}: ${formatValue(value)}`);
    }
    for (const [name, value] of Object.entries(resource.relationships)) {
      lines.push(`${GUTTER}${GUTTER}${name}: ${formatRelationship(value)}`);
    }
  }
  return `${lines.join("\n")}\n`;
};

/**
 * Text form of a sparse projection: a detail block for one resource, or a table
 * whose columns are every attribute and relationship seen, in first-seen order.
 */
export const renderSparseText = (projection: SparseProjection) => {
  const included = projection.included;
  let text: string;

  if ("data" in projection) {
    const attributeKeys: string[] = [];
    const relationshipKeys: string[] = [];
    for (const resource of projection.data) {
      for (const key of Object.keys(resource.attributes)) {
        if (!attributeKeys.includes(key)) attributeKeys.push(key);
      }
      for (const key of Object.keys(resource.relationships)) {
        if (!relationshipKeys.includes(key)) relationshipKeys.push(key);
      }
    }

    const columns: Column[] = [
      { header: "ID" },
      { header: "TYPE" },
      ...attributeKeys.map((key) => ({ header: key.toUpperCase(), maxWidth: 40 })),
      ...relationshipKeys.map((key) => ({ header: key.toUpperCase(), maxWidth: 40 }))
    ];
    const rows = projection.data.map((resource) => [
      resource.id,
      resource.type,
      ...attributeKeys.map((key) => formatValue(resource.attributes[key])),
      ...relationshipKeys.map((key) => {
        const value = resource.relationships[key];
        return value === undefined ? "" : formatRelationship(value);
      })
    ]);
    text = renderTable(columns, rows);
  } else {
    text = renderDetail(projectedSections(projection));
  }

  if (included && Object.keys(included).length > 0) {
    text = `${text}\n${renderIncluded(included)}`;
  }
  return text;
};

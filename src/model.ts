export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Attributes = Readonly<Record<string, JsonValue>>;

export type ResourceRef = {
  readonly type: string;
  readonly id: string;
};

/**
 * One relationship member as received.
 *
 * `data` is the typed decode: `undefined` when the member carried no `data` key,
 * `"irregular"` when it held something other than well-formed resource identifiers.
 * `raw` keeps the undecoded `data` value for callers that re-walk it.
 */
export type Relationship = {
  readonly data: ResourceRef | ResourceRef[] | null | undefined | "irregular";
  readonly raw: JsonValue | undefined;
};

export type Resource = {
  readonly type: string;
  readonly id: string;
  readonly attributes: Attributes;
  readonly relationships: Readonly<Record<string, Relationship>>;
};

export type DocumentShape = "single" | "collection";

export type Document =
  | {
      readonly shape: "single";
      readonly primary: Resource;
      readonly included: readonly Resource[];
      readonly meta?: JsonObject;
      readonly links?: JsonObject;
    }
  | {
      readonly shape: "collection";
      readonly primary: readonly Resource[];
      readonly included: readonly Resource[];
      readonly meta?: JsonObject;
      readonly links?: JsonObject;
    };

export type RelationshipState =
  | { readonly kind: "absent" }
  | { readonly kind: "null" }
  | { readonly kind: "to-one"; readonly ref: ResourceRef }
  | { readonly kind: "to-many"; readonly refs: readonly ResourceRef[] };

// The type is escaped so that no ":" inside it can shift the boundary with the id.
export const resourceKey = (type: string, id: string) => `${encodeURIComponent(type)}:${id}`;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

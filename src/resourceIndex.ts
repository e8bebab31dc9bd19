import { resourceKey, type Resource, type ResourceRef } from "./model.js";

/**
 * Lookup table over a document's side-loaded resources, keyed by `(type, id)`.
 * When `included` carries the same key twice, the later entry wins.
 */
export class ResourceIndex implements Iterable<Resource> {
  private readonly byKey = new Map<string, Resource>();

  constructor(included: Iterable<Resource>) {
    for (const resource of included) {
      this.byKey.set(resourceKey(resource.type, resource.id), resource);
    }
  }

  get size() {
    return this.byKey.size;
  }

  lookup(type: string, id: string): Resource | undefined {
    return this.byKey.get(resourceKey(type, id));
  }

  get(ref: ResourceRef): Resource | undefined {
    return this.lookup(ref.type, ref.id);
  }

  has(ref: ResourceRef) {
    return this.byKey.has(resourceKey(ref.type, ref.id));
  }

  [Symbol.iterator]() {
    return this.byKey.values();
  }
}

export const buildIndex = (included: Iterable<Resource>) => new ResourceIndex(included);

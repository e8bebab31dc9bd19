import type { Resource } from "../model.js";
import type { Column, DetailSection } from "../output.js";
import type { ResourceIndex } from "../resourceIndex.js";

export type ViewColumn<TRow> = Column & {
  value: (row: TRow) => string;
};

export type ViewDefinition<TRow, TDetails> = {
  type: string;
  /** `include` and `fields[...]` parameters the view needs from the server. */
  query: Record<string, string>;
  columns: ViewColumn<TRow>[];
  buildRow: (resource: Resource, index: ResourceIndex) => TRow;
  buildDetails: (resource: Resource, index: ResourceIndex) => TDetails;
  renderDetails: (details: TDetails) => DetailSection[];
};

export type ListOutput = {
  columns: Column[];
  rows: string[][];
  json: unknown[];
};

export type ShowOutput = {
  sections: DetailSection[];
  json: unknown;
};

export type ResourceView = {
  type: string;
  query: Record<string, string>;
  list: (resources: readonly Resource[], index: ResourceIndex) => ListOutput;
  show: (resource: Resource, index: ResourceIndex) => ShowOutput;
};

export const defineView = <TRow, TDetails>(definition: ViewDefinition<TRow, TDetails>): ResourceView => ({
  type: definition.type,
  query: definition.query,
  list: (resources, index) => {
    const rows = resources.map((resource) => definition.buildRow(resource, index));
    return {
      columns: definition.columns.map(({ header, maxWidth }) => ({ header, maxWidth })),
      rows: rows.map((row) => definition.columns.map((column) => column.value(row))),
      json: rows
    };
  },
  show: (resource, index) => {
    const details = definition.buildDetails(resource, index);
    return {
      sections: definition.renderDetails(details),
      json: details
    };
  }
});

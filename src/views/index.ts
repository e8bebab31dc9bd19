import { brokerMembershipsView } from "./brokerMemberships.js";
import { brokersView } from "./brokers.js";
import { genericView } from "./generic.js";
import type { ResourceView } from "./types.js";

const views = new Map<string, ResourceView>(
  [brokersView, brokerMembershipsView].map((view): [string, ResourceView] => [view.type, view])
);

export const viewFor = (type: string): ResourceView => views.get(type) ?? genericView(type);

export const registeredViewTypes = () => Array.from(views.keys()).sort();

export type { ResourceView } from "./types.js";

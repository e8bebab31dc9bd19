import { asBool, asNumber, asString, firstNonEmpty } from "../attributes.js";
import type { Resource } from "../model.js";
import { fieldIf, formatBool, formatLabelWithId } from "../output.js";
import { resolveRelated, resolveRelatedOne } from "../relationships.js";
import type { ResourceIndex } from "../resourceIndex.js";
import { defineView } from "./types.js";

type BusinessUnit = {
  id: string;
  name?: string;
};

type BrokerMembershipRow = {
  id: string;
  user_id: string;
  user_name: string;
  broker_id: string;
  broker_name: string;
  kind: string;
  is_admin: boolean;
};

type BrokerMembershipDetails = BrokerMembershipRow & {
  user_email?: string;
  user_mobile?: string;
  project_office_id?: string;
  project_office_name?: string;
  business_units: BusinessUnit[];
  title?: string;
  color_hex?: string;
  external_employee_id?: string;
  explicit_sort_order?: number;
  start_at?: string;
  end_at?: string;
  can_see_rates_as_driver: boolean;
  can_see_rates_as_manager: boolean;
  is_rate_editor: boolean;
  is_time_card_auditor: boolean;
  enable_recap_notifications: boolean;
};

const optional = (value: string) => (value ? value : undefined);

const organizationName = (resource: Resource | undefined) =>
  resource ? firstNonEmpty(asString(resource.attributes, "company-name"), asString(resource.attributes, "name")) : "";

/**
 * The membership points at its broker through `broker`, or through the
 * polymorphic `organization` when only that one was sent.
 */
const resolveBroker = (resource: Resource, index: ResourceIndex) => {
  const broker = resolveRelatedOne(index, resource, "broker");
  if (broker) return { id: broker.ref.id, name: organizationName(broker.resource) };

  const organization = resolveRelatedOne(index, resource, "organization");
  if (organization && organization.ref.type === "brokers") {
    return { id: organization.ref.id, name: organizationName(organization.resource) };
  }
  return { id: "", name: "" };
};

const buildRow = (resource: Resource, index: ResourceIndex): BrokerMembershipRow => {
  const attrs = resource.attributes;
  const user = resolveRelatedOne(index, resource, "user");
  const broker = resolveBroker(resource, index);

  return {
    id: resource.id,
    user_id: user?.ref.id ?? "",
    user_name: user?.resource ? asString(user.resource.attributes, "name").trim() : "",
    broker_id: broker.id,
    broker_name: broker.name,
    kind: asString(attrs, "kind"),
    is_admin: asBool(attrs, "is-admin")
  };
};

export const brokerMembershipsView = defineView<BrokerMembershipRow, BrokerMembershipDetails>({
  type: "broker-memberships",
  query: {
    include: "user,organization,broker,project-office,business-units",
    "fields[users]": "name,email-address,mobile-number",
    "fields[brokers]": "company-name",
    "fields[project-offices]": "name",
    "fields[business-units]": "company-name"
  },
  columns: [
    { header: "ID", value: (row) => row.id },
    { header: "USER", value: (row) => formatLabelWithId(row.user_name, row.user_id), maxWidth: 40 },
    { header: "BROKER", value: (row) => formatLabelWithId(row.broker_name, row.broker_id), maxWidth: 40 },
    { header: "KIND", value: (row) => row.kind }
  ],
  buildRow,
  buildDetails: (resource, index) => {
    const attrs = resource.attributes;
    const user = resolveRelatedOne(index, resource, "user");
    const projectOffice = resolveRelatedOne(index, resource, "project-office");
    const businessUnits = resolveRelated(index, resource, "business-units").map((entry) => {
      const name = organizationName(entry.resource);
      return name ? { id: entry.ref.id, name } : { id: entry.ref.id };
    });

    return {
      ...buildRow(resource, index),
      user_email: user?.resource ? optional(asString(user.resource.attributes, "email-address").trim()) : undefined,
      user_mobile: user?.resource ? optional(asString(user.resource.attributes, "mobile-number").trim()) : undefined,
      project_office_id: projectOffice?.ref.id,
      project_office_name: projectOffice?.resource
        ? optional(asString(projectOffice.resource.attributes, "name").trim())
        : undefined,
      business_units: businessUnits,
      title: optional(asString(attrs, "title").trim()),
      color_hex: optional(asString(attrs, "color-hex").trim()),
      external_employee_id: optional(asString(attrs, "external-employee-id").trim()),
      explicit_sort_order: asNumber(attrs, "explicit-sort-order"),
      start_at: optional(asString(attrs, "start-at")),
      end_at: optional(asString(attrs, "end-at")),
      can_see_rates_as_driver: asBool(attrs, "can-see-rates-as-driver"),
      can_see_rates_as_manager: asBool(attrs, "can-see-rates-as-manager"),
      is_rate_editor: asBool(attrs, "is-rate-editor"),
      is_time_card_auditor: asBool(attrs, "is-time-card-auditor"),
      enable_recap_notifications: asBool(attrs, "enable-recap-notifications")
    };
  },
  renderDetails: (details) => [
    { fields: [["ID", details.id]] },
    {
      title: "User",
      fields: [
        ["ID", details.user_id],
        ["Name", details.user_name],
        ...fieldIf("Email", details.user_email ?? ""),
        ...fieldIf("Mobile", details.user_mobile ?? "")
      ]
    },
    {
      title: "Broker",
      fields: [
        ["ID", details.broker_id],
        ["Name", details.broker_name]
      ]
    },
    {
      title: "Project Office",
      fields: details.project_office_id
        ? [
            ["ID", details.project_office_id],
            ["Name", details.project_office_name ?? ""]
          ]
        : []
    },
    {
      title: "Business Units",
      fields: details.business_units.map((unit, position): [string, string] => [
        String(position + 1),
        formatLabelWithId(unit.name ?? "", unit.id)
      ])
    },
    {
      title: "Role",
      fields: [
        ["Kind", details.kind],
        ["Is Admin", formatBool(details.is_admin)],
        ...fieldIf("Title", details.title ?? ""),
        ...fieldIf("Color", details.color_hex ?? ""),
        ...fieldIf("External Employee ID", details.external_employee_id ?? ""),
        ...fieldIf(
          "Explicit Sort Order",
          details.explicit_sort_order === undefined ? "" : String(details.explicit_sort_order)
        )
      ]
    },
    {
      title: "Effective Period",
      fields: [...fieldIf("Start", details.start_at ?? ""), ...fieldIf("End", details.end_at ?? "")]
    },
    {
      title: "Permissions",
      fields: [
        ["Can See Rates As Driver", formatBool(details.can_see_rates_as_driver)],
        ["Can See Rates As Manager", formatBool(details.can_see_rates_as_manager)],
        ["Is Rate Editor", formatBool(details.is_rate_editor)],
        ["Is Time Card Auditor", formatBool(details.is_time_card_auditor)]
      ]
    },
    {
      title: "Notifications",
      fields: [["Recap Notifications", formatBool(details.enable_recap_notifications)]]
    }
  ]
});

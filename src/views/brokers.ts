import { asBool, asString, asStringSequence, firstNonEmpty } from "../attributes.js";
import type { Resource } from "../model.js";
import { fieldIf, formatBool } from "../output.js";
import { defineView } from "./types.js";

type BrokerRow = {
  id: string;
  company_name: string;
  abbreviation: string;
  is_active: boolean;
  is_transport_only: boolean;
};

type BrokerDetails = BrokerRow & {
  default_reply_to_email_address: string;
  remit_to_address: string;
  help_text: string;
  quickbooks_enabled: boolean;
  disabled_feedback_types: string[];
  send_lineup_summaries_to: string[];
};

const buildBrokerRow = (resource: Resource): BrokerRow => {
  const attrs = resource.attributes;
  return {
    id: resource.id,
    company_name: firstNonEmpty(asString(attrs, "company-name"), asString(attrs, "name")),
    abbreviation: asString(attrs, "abbreviation").trim(),
    is_active: asBool(attrs, "is-active"),
    is_transport_only: asBool(attrs, "is-transport-only")
  };
};

export const brokersView = defineView<BrokerRow, BrokerDetails>({
  type: "brokers",
  query: {},
  columns: [
    { header: "ID", value: (row) => row.id },
    { header: "NAME", value: (row) => row.company_name, maxWidth: 40 },
    { header: "ABBREV", value: (row) => row.abbreviation },
    { header: "ACTIVE", value: (row) => formatBool(row.is_active) },
    { header: "TRANSPORT ONLY", value: (row) => formatBool(row.is_transport_only) }
  ],
  buildRow: buildBrokerRow,
  buildDetails: (resource) => {
    const attrs = resource.attributes;
    return {
      ...buildBrokerRow(resource),
      default_reply_to_email_address: asString(attrs, "default-reply-to-email-address").trim(),
      remit_to_address: asString(attrs, "remit-to-address").trim(),
      help_text: asString(attrs, "help-text").trim(),
      quickbooks_enabled: asBool(attrs, "quickbooks-enabled"),
      disabled_feedback_types: asStringSequence(attrs, "disabled-feedback-types"),
      send_lineup_summaries_to: asStringSequence(attrs, "send-lineup-summaries-to")
    };
  },
  renderDetails: (details) => [
    {
      fields: [
        ["ID", details.id],
        ["Name", details.company_name]
      ]
    },
    {
      title: "Settings",
      fields: [
        ...fieldIf("Abbreviation", details.abbreviation),
        ["Active", formatBool(details.is_active)],
        ["Transport Only", formatBool(details.is_transport_only)],
        ["QuickBooks Enabled", formatBool(details.quickbooks_enabled)]
      ]
    },
    {
      title: "Contact",
      fields: [
        ...fieldIf("Reply-To Email", details.default_reply_to_email_address),
        ...fieldIf("Remit-To Address", details.remit_to_address),
        ...fieldIf("Lineup Summaries To", details.send_lineup_summaries_to.join(", "))
      ]
    },
    {
      title: "Feedback",
      fields: fieldIf("Disabled Types", details.disabled_feedback_types.join(", "))
    },
    {
      title: "Help Text",
      fields: fieldIf("Text", details.help_text)
    }
  ]
});

import test from "node:test";
import assert from "node:assert/strict";
import {
  fieldIf,
  formatLabelWithId,
  formatValue,
  renderDetail,
  renderJson,
  renderSparseText,
  renderTable,
  stripNulls,
  truncate
} from "../output.js";

test("renderTable pads every column but the last", () => {
  const text = renderTable(
    [{ header: "ID" }, { header: "NAME" }],
    [
      ["1", "Acme"],
      ["22", "B"]
    ]
  );
  assert.equal(text, "ID  NAME\n1   Acme\n22  B\n");
});

test("renderTable truncates cells past their max width", () => {
  assert.equal(truncate("abcdef", 4), "abc…");
  assert.equal(truncate("abc", 4), "abc");
  assert.equal(renderTable([{ header: "NAME", maxWidth: 4 }], [["abcdef"]]), "NAME\nabc…\n");
});

test("renderDetail skips empty sections and indents titled ones", () => {
  const text = renderDetail([
    { fields: [["ID", "1"]] },
    { title: "Settings", fields: [["Active", "yes"]] },
    { title: "Empty", fields: [] }
  ]);
  assert.equal(text, "ID: 1\n\nSettings:\n  Active: yes\n");
  assert.equal(renderDetail([{ title: "Empty", fields: [] }]), "");
});

test("renderJson can drop null members", () => {
  const value = { a: null, b: [null, { c: null, d: 1 }] };
  assert.deepEqual(stripNulls(value), { b: [null, { d: 1 }] });
  assert.equal(renderJson({ a: null }), '{\n  "a": null\n}\n');
  assert.equal(renderJson({ a: null, b: 1 }, { omitNull: true }), '{\n  "b": 1\n}\n');
});

test("formatting helpers", () => {
  assert.deepEqual(fieldIf("Email", ""), []);
  assert.deepEqual(fieldIf("Email", "a@example.com"), [["Email", "a@example.com"]]);
  assert.equal(formatLabelWithId("Acme", "1"), "Acme (1)");
  assert.equal(formatLabelWithId("", "1"), "1");
  assert.equal(formatLabelWithId("Acme", ""), "");
  assert.equal(formatValue(null), "null");
  assert.equal(formatValue({ a: 1 }), '{"a":1}');
});

test("renderSparseText lays out a collection with one column per key seen", () => {
  const text = renderSparseText({
    data: [
      {
        id: "1",
        type: "brokers",
        attributes: { status: "active" },
        relationships: { owner: { type: "users", id: "2" } }
      },
      { id: "2", type: "brokers", attributes: {}, relationships: { owner: null } }
    ]
  });

  assert.equal(
    text,
    ["ID  TYPE     STATUS  OWNER", "1   brokers  active  users:2", `2   brokers${" ".repeat(10)}null`, ""].join("\n")
  );
});

test("renderSparseText shows a single resource with its included block", () => {
  const text = renderSparseText({
    id: "5",
    type: "broker-memberships",
    attributes: { kind: "manager" },
    relationships: { user: { type: "users", id: "2" }, "business-units": [] },
    included: {
      "users:2": { id: "2", type: "users", attributes: { name: "Ada" }, relationships: {} }
    }
  });

  assert.equal(
    text,
    [
      "ID: 5",
      "Type: broker-memberships",
      "",
      "Attributes:",
      "  kind: manager",
      "",
      "Relationships:",
      "  user: users:2",
      "  business-units: (none)",
      "",
      "Included:",
      "  users:2",
      "    name: Ada",
      ""
    ].join("\n")
  );
});

import test from "node:test";
import assert from "node:assert/strict";
import { parseDocument } from "../document.js";
import { UsageError } from "../errors.js";
import {
  isSparseRequested,
  parseSparseSelection,
  projectDocument,
  projectResource,
  selectionQuery
} from "../sparse.js";

test("parseSparseSelection merges repeated flags without duplicates", () => {
  const selection = parseSparseSelection({
    fields: ["brokers=company-name,status", "brokers=status,abbreviation", "users=name"],
    include: ["broker,user", "user"]
  });

  assert.deepEqual(selection, {
    fields: { brokers: ["company-name", "status", "abbreviation"], users: ["name"] },
    include: ["broker", "user"],
    forced: false
  });
  assert.deepEqual(selectionQuery(selection), {
    "fields[brokers]": "company-name,status,abbreviation",
    "fields[users]": "name",
    include: "broker,user"
  });
});

test("parseSparseSelection rejects a fieldset without a type", () => {
  assert.throws(() => parseSparseSelection({ fields: ["=name"] }), UsageError);
  assert.throws(() => parseSparseSelection({ fields: ["name"] }), UsageError);
});

test("isSparseRequested is false only for an empty selection", () => {
  assert.equal(isSparseRequested(parseSparseSelection({})), false);
  assert.equal(isSparseRequested(parseSparseSelection({ sparse: true })), true);
  assert.equal(isSparseRequested(parseSparseSelection({ include: ["user"] })), true);
  assert.deepEqual(selectionQuery(parseSparseSelection({ sparse: true })), {});
});

test("projection echoes only the attributes the server sent", () => {
  const document = parseDocument('{"data":{"type":"brokers","id":"1","attributes":{"status":"active"}}}', "single");

  assert.deepEqual(projectDocument(document), {
    id: "1",
    type: "brokers",
    attributes: { status: "active" },
    relationships: {}
  });
});

test("projection keeps explicit nulls and drops absent relationships", () => {
  const document = parseDocument(
    JSON.stringify({
      data: {
        type: "brokers",
        id: "1",
        attributes: { "help-text": null },
        relationships: {
          seller: { data: null },
          trucks: { data: [] },
          owner: { data: { type: "users", id: "2" } },
          drivers: { links: { related: "/v1/brokers/1/drivers" } }
        }
      }
    }),
    "single"
  );
  if (document.shape !== "single") return;

  assert.deepEqual(projectResource(document.primary), {
    id: "1",
    type: "brokers",
    attributes: { "help-text": null },
    relationships: { seller: null, trucks: [], owner: { type: "users", id: "2" } }
  });
});

test("projection keys included resources by type and id", () => {
  const document = parseDocument(
    JSON.stringify({
      data: [{ type: "broker-memberships", id: "5", relationships: { user: { data: { type: "users", id: "2" } } } }],
      included: [
        { type: "users", id: "2", attributes: { name: "Old" } },
        { type: "users", id: "2", attributes: { name: "New" } }
      ]
    }),
    "collection"
  );

  assert.deepEqual(projectDocument(document), {
    data: [
      {
        id: "5",
        type: "broker-memberships",
        attributes: {},
        relationships: { user: { type: "users", id: "2" } }
      }
    ],
    included: {
      "users:2": { id: "2", type: "users", attributes: { name: "New" }, relationships: {} }
    }
  });
});

test("projection of an empty collection has no included member", () => {
  assert.deepEqual(projectDocument(parseDocument('{"data":[]}')), { data: [] });
});

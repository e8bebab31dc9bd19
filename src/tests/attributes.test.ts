import test from "node:test";
import assert from "node:assert/strict";
import { asBool, asNumber, asRawValue, asString, asStringSequence, firstNonEmpty } from "../attributes.js";

test("asString renders scalars and defaults to empty", () => {
  assert.equal(asString({ x: 42 }, "x"), "42");
  assert.equal(asString({ x: "hello" }, "x"), "hello");
  assert.equal(asString({ x: false }, "x"), "false");
  assert.equal(asString({}, "x"), "");
  assert.equal(asString({ x: null }, "x"), "");
  assert.equal(asString(undefined, "x"), "");
  assert.equal(asString({ x: ["a", 1] }, "x"), '["a",1]');
});

test("asBool is true only for a JSON true", () => {
  assert.equal(asBool({ x: true }, "x"), true);
  assert.equal(asBool({ x: "true" }, "x"), false);
  assert.equal(asBool({ x: 1 }, "x"), false);
  assert.equal(asBool({}, "x"), false);
});

test("asStringSequence lifts scalars and keeps list order", () => {
  assert.deepEqual(asStringSequence({ x: "solo" }, "x"), ["solo"]);
  assert.deepEqual(asStringSequence({ x: ["a", "b"] }, "x"), ["a", "b"]);
  assert.deepEqual(asStringSequence({}, "x"), []);
  assert.deepEqual(asStringSequence({ x: null }, "x"), []);
  assert.deepEqual(asStringSequence({ x: "" }, "x"), []);
  assert.deepEqual(asStringSequence({ x: ["a", null, 3] }, "x"), ["a", "3"]);
});

test("asNumber accepts numbers and numeric strings", () => {
  assert.equal(asNumber({ x: 3 }, "x"), 3);
  assert.equal(asNumber({ x: "2.5" }, "x"), 2.5);
  assert.equal(asNumber({ x: "" }, "x"), undefined);
  assert.equal(asNumber({ x: "abc" }, "x"), undefined);
  assert.equal(asNumber({ x: true }, "x"), undefined);
});

test("asRawValue returns the value untouched", () => {
  assert.deepEqual(asRawValue({ x: { nested: [1] } }, "x"), { nested: [1] });
  assert.equal(asRawValue({ x: null }, "x"), null);
  assert.equal(asRawValue({}, "x"), undefined);
  assert.equal(asRawValue({}, "constructor"), undefined);
});

test("firstNonEmpty skips blank values and trims the winner", () => {
  assert.equal(firstNonEmpty("", "  ", " Acme "), "Acme");
  assert.equal(firstNonEmpty("", ""), "");
});

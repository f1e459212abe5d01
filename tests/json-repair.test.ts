import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  repairJson,
  parseObject,
  escapeControlChars,
  quoteBareKeys,
  replaceFullwidthQuotes,
  topLevelEntries,
  memberText,
} from "../src/tools/json-repair.js";

describe("repairJson", () => {
  it("parses valid JSON in the first stage", () => {
    const r = repairJson('{"name": "search", "arguments": {"query": "cats"}}');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.stage, "escape-controls");
    assert.deepEqual(r.value, { name: "search", arguments: { query: "cats" } });
  });

  it("re-escapes raw newlines inside string values", () => {
    const r = repairJson('{"name": "search", "arguments": {"query": "line1\nline2"}}');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.stage, "escape-controls");
    assert.deepEqual(r.value, { name: "search", arguments: { query: "line1\nline2" } });
  });

  it("quotes bare keys", () => {
    const r = repairJson('{name: "search", arguments: {query: "cats"}}');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.stage, "quote-keys");
    assert.deepEqual(r.value, { name: "search", arguments: { query: "cats" } });
  });

  it("turns corner brackets into quotes", () => {
    const r = repairJson('{"name": "search", "arguments": {"query": 「東京の天気」}}');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.stage, "fullwidth-quotes");
    assert.deepEqual(r.value, { name: "search", arguments: { query: "東京の天気" } });
  });

  it("closes a truncated object", () => {
    const r = repairJson('{"name": "search", "arguments": {"query": "cats"');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.stage, "close-brackets");
    assert.deepEqual(r.value, { name: "search", arguments: { query: "cats" } });
  });

  it("closes a truncated string and object", () => {
    const r = repairJson('{"name": "message", "arguments": {"content": "hi');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.stage, "close-brackets");
    assert.deepEqual(r.value, { name: "message", arguments: { content: "hi" } });
  });

  it("reports failure without throwing", () => {
    assert.deepEqual(repairJson("not json at all"), { ok: false });
    assert.deepEqual(repairJson("{this is not json}"), { ok: false });
  });

  it("rejects non-object JSON", () => {
    assert.deepEqual(repairJson("[1, 2]"), { ok: false });
    assert.deepEqual(repairJson('"text"'), { ok: false });
  });
});

describe("repair stages", () => {
  it("escapeControlChars only touches string values", () => {
    assert.equal(escapeControlChars('{"a": "x\ty"}'), '{"a": "x\\ty"}');
    assert.equal(escapeControlChars('{\n"a": 1}'), '{\n"a": 1}');
  });

  it("quoteBareKeys leaves quoted keys alone", () => {
    assert.equal(quoteBareKeys('{"a": 1, b: 2}'), '{"a": 1, "b": 2}');
  });

  it("replaceFullwidthQuotes maps all four brackets", () => {
    assert.equal(replaceFullwidthQuotes("「a」『b』"), '"a""b"');
  });

  it("parseObject accepts only objects", () => {
    assert.deepEqual(parseObject('{"a": 1}'), { ok: true, value: { a: 1 } });
    assert.deepEqual(parseObject("null"), { ok: false });
    assert.deepEqual(parseObject("{"), { ok: false });
  });
});

describe("topLevelEntries", () => {
  it("lists members in the order written", () => {
    assert.deepEqual(topLevelEntries('{"query": "deep sea", "2": "ignored"}'), [
      ["query", '"deep sea"'],
      ["2", '"ignored"'],
    ]);
  });

  it("keeps nested values whole and skips their keys", () => {
    assert.deepEqual(topLevelEntries('{"name":"search","arguments":{"q":"a, b}","n":[1,{"x":2}]},"z":null}'), [
      ["name", '"search"'],
      ["arguments", '{"q":"a, b}","n":[1,{"x":2}]}'],
      ["z", "null"],
    ]);
  });

  it("handles escaped quotes in keys and values", () => {
    assert.deepEqual(topLevelEntries('{"a\\"b": "c\\"d"}'), [['a"b', '"c\\"d"']]);
  });

  it("is empty for an empty object", () => {
    assert.deepEqual(topLevelEntries("{}"), []);
  });
});

describe("memberText", () => {
  it("returns the last member with the name", () => {
    assert.equal(memberText('{"arguments": 1, "arguments": {"q": "x"}}', "arguments"), '{"q": "x"}');
    assert.equal(memberText('{"a": 1}', "arguments"), undefined);
  });
});

describe("repairJson source text", () => {
  it("returns the text that parsed", () => {
    const r = repairJson('{name: "search", arguments: {query: "cats"}}');
    assert.equal(r.ok, true);
    if (!r.ok) return;
    assert.equal(r.text, '{ "name": "search", "arguments": { "query": "cats"}}');
  });
});

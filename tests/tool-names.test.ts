import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { normalizeToolName, toolNameSpellings } from "../src/tools/tool-names.js";
import { reduceArguments, callFromObject } from "../src/tools/call-matchers.js";

describe("normalizeToolName", () => {
  it("maps Japanese synonyms", () => {
    assert.equal(normalizeToolName("検索"), "search");
    assert.equal(normalizeToolName("調べる"), "search");
    assert.equal(normalizeToolName("伝える"), "message");
  });

  it("maps English synonyms and trims", () => {
    assert.equal(normalizeToolName(" web_search "), "search");
    assert.equal(normalizeToolName("say"), "message");
  });

  it("passes unknown names through", () => {
    assert.equal(normalizeToolName("calculator"), "calculator");
  });

  it("lists canonical names first", () => {
    assert.deepEqual(toolNameSpellings().slice(0, 2), ["search", "message"]);
  });
});

describe("reduceArguments", () => {
  it("takes the first key of an object", () => {
    assert.equal(reduceArguments({ query: "first", extra: "second" }), "first");
  });

  it("decodes a JSON-encoded string", () => {
    assert.equal(reduceArguments('{"query": "rust"}'), "rust");
  });

  it("keeps a plain string", () => {
    assert.equal(reduceArguments("plain text"), "plain text");
  });

  it("stringifies non-string values", () => {
    assert.equal(reduceArguments({ n: 5 }), "5");
    assert.equal(reduceArguments({ q: { nested: 1 } }), '{"nested":1}');
  });

  it("follows the source text's key order when given it", () => {
    const source = '{"query": "deep sea", "2": "ignored"}';
    assert.equal(reduceArguments(JSON.parse(source), source), "deep sea");
    assert.equal(reduceArguments('{"content": "hi", "10": "no"}'), "hi");
  });

  it("yields empty for empty input", () => {
    assert.equal(reduceArguments({}), "");
    assert.equal(reduceArguments(null), "");
  });
});

describe("callFromObject", () => {
  it("reads name and arguments", () => {
    assert.deepEqual(callFromObject({ name: "検索", arguments: { query: "x" } }, "tool-call-json"), {
      name: "search",
      argument: "x",
      matcher: "tool-call-json",
    });
  });

  it("uses the implied name when the object has none", () => {
    assert.deepEqual(callFromObject({ query: "y" }, "bare-name", "search"), {
      name: "search",
      argument: "y",
      matcher: "bare-name",
    });
  });

  it("reads the arguments' key order from the source", () => {
    const source = '{"name": "search", "arguments": {"query": "whales", "3": "skip"}}';
    assert.deepEqual(callFromObject(JSON.parse(source), "tool-call-json", undefined, source), {
      name: "search",
      argument: "whales",
      matcher: "tool-call-json",
    });
  });

  it("returns null without any name", () => {
    assert.equal(callFromObject({ query: "y" }, "fenced"), null);
  });
});

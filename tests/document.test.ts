import { describe, it, expect } from "vitest";
import {
  asSequence,
  fromPlain,
  getField,
  hasField,
  isTruthy,
  sequenceItems,
  toPlain,
} from "../src/document/node.js";
import { parsePolicyText, renderYaml } from "../src/utils/yaml.js";
import { ParseError } from "../src/errors.js";

describe("fromPlain", () => {
  it("wraps mappings, sequences, scalars and null", () => {
    const node = fromPlain({ kind: "CiliumNetworkPolicy", spec: { ingress: [{}] }, extra: null });
    expect(node.type).toBe("mapping");
    expect(getField(node, "kind")).toEqual({ type: "scalar", value: "CiliumNetworkPolicy" });
    expect(getField(node, "extra")).toEqual({ type: "null" });
    expect(asSequence(getField(getField(node, "spec"), "ingress"))?.items).toHaveLength(1);
  });

  it("preserves key order when unwrapped", () => {
    const plain = { b: 1, a: [true, "x"], c: { d: null } };
    expect(JSON.stringify(toPlain(fromPlain(plain)))).toBe('{"b":1,"a":[true,"x"],"c":{"d":null}}');
    expect(toPlain(fromPlain(plain))).toEqual(plain);
  });
});

describe("field accessors", () => {
  const doc = fromPlain({ metadata: { name: null }, list: [1, 2] });

  it("returns undefined for missing fields and non-mappings", () => {
    expect(getField(doc, "spec")).toBeUndefined();
    expect(getField(getField(doc, "list"), "0")).toBeUndefined();
    expect(getField(undefined, "x")).toBeUndefined();
  });

  it("reports presence even for null values", () => {
    expect(hasField(getField(doc, "metadata"), "name")).toBe(true);
    expect(hasField(getField(doc, "metadata"), "namespace")).toBe(false);
  });

  it("yields no items for non-sequences", () => {
    expect(sequenceItems(getField(doc, "metadata"))).toEqual([]);
    expect(sequenceItems(getField(doc, "list"))).toHaveLength(2);
  });
});

describe("isTruthy", () => {
  it.each([
    [null, false],
    [false, false],
    [0, false],
    ["", false],
    [[], false],
    [{}, false],
    [true, true],
    [53, true],
    ["53", true],
    [[{}], true],
    [{ a: null }, true],
  ])("%j -> %s", (value, expected) => {
    expect(isTruthy(fromPlain(value))).toBe(expected);
  });

  it("treats a missing node as falsy", () => {
    expect(isTruthy(undefined)).toBe(false);
  });
});

describe("parsePolicyText", () => {
  it("parses YAML and JSON", () => {
    expect(getField(parsePolicyText("kind: Pod\n", "a.yaml"), "kind")).toEqual({
      type: "scalar",
      value: "Pod",
    });
    expect(getField(parsePolicyText('{"kind": "Pod"}', "a.json"), "kind")).toEqual({
      type: "scalar",
      value: "Pod",
    });
  });

  it("parses an empty file as null", () => {
    expect(parsePolicyText("", "empty.yaml")).toEqual({ type: "null" });
  });

  it("wraps syntax errors in ParseError", () => {
    expect(() => parsePolicyText("kind: [unclosed\n", "broken.yaml")).toThrow(ParseError);
  });
});

describe("renderYaml", () => {
  it("single-quotes strings that look like numbers", () => {
    expect(renderYaml(fromPlain({ port: "53" }))).toBe("port: '53'\n");
    expect(renderYaml(fromPlain({ port: 53 }))).toBe("port: 53\n");
  });
});

import type { PlainValue } from "../types.js";

/**
 * Parsed policy document tree.
 *
 * Every parsed value is wrapped in one of four variants so field access is
 * checked instead of indexing into an untyped object. Accessors return
 * `undefined` for missing fields or mismatched variants, which keeps the
 * lenient treatment of missing and extra fields.
 */
export type DocNode = MappingNode | SequenceNode | ScalarNode | NullNode;

export interface MappingNode {
  type: "mapping";
  entries: Map<string, DocNode>;
}

export interface SequenceNode {
  type: "sequence";
  items: DocNode[];
}

export interface ScalarNode {
  type: "scalar";
  value: string | number | boolean;
}

export interface NullNode {
  type: "null";
}

export const NULL_NODE: NullNode = { type: "null" };

/**
 * Wrap a value produced by a YAML/JSON parser.
 * Values outside the JSON data model (dates, bigints, binary) become
 * their string form.
 */
export function fromPlain(value: unknown): DocNode {
  if (value === null || value === undefined) return NULL_NODE;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return { type: "scalar", value };
  }
  if (Array.isArray(value)) {
    return { type: "sequence", items: value.map(fromPlain) };
  }
  if (value instanceof Map) {
    const entries = new Map<string, DocNode>();
    for (const [key, item] of value) {
      entries.set(String(key), fromPlain(item));
    }
    return { type: "mapping", entries };
  }
  if (typeof value === "object" && !(value instanceof Date) && !ArrayBuffer.isView(value)) {
    const entries = new Map<string, DocNode>();
    for (const [key, item] of Object.entries(value)) {
      entries.set(key, fromPlain(item));
    }
    return { type: "mapping", entries };
  }
  return { type: "scalar", value: String(value) };
}

/** Unwrap back into a JSON-compatible value, preserving key order. */
export function toPlain(node: DocNode): PlainValue {
  switch (node.type) {
    case "null":
      return null;
    case "scalar":
      return node.value;
    case "sequence":
      return node.items.map(toPlain);
    case "mapping": {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, item] of node.entries) {
        out[key] = toPlain(item);
      }
      return out;
    }
  }
}

export function asMapping(node: DocNode | undefined): MappingNode | undefined {
  return node?.type === "mapping" ? node : undefined;
}

export function asSequence(node: DocNode | undefined): SequenceNode | undefined {
  return node?.type === "sequence" ? node : undefined;
}

export function asString(node: DocNode | undefined): string | undefined {
  return node?.type === "scalar" && typeof node.value === "string" ? node.value : undefined;
}

/** Field lookup on a mapping; undefined for anything else. */
export function getField(node: DocNode | undefined, key: string): DocNode | undefined {
  return asMapping(node)?.entries.get(key);
}

export function hasField(node: DocNode | undefined, key: string): boolean {
  return asMapping(node)?.entries.has(key) ?? false;
}

/**
 * Truthiness of a document value: null, false, 0, "", empty sequences and
 * empty mappings are falsy.
 */
export function isTruthy(node: DocNode | undefined): boolean {
  if (!node) return false;
  switch (node.type) {
    case "null":
      return false;
    case "scalar":
      return node.value !== false && node.value !== 0 && node.value !== "";
    case "sequence":
      return node.items.length > 0;
    case "mapping":
      return node.entries.size > 0;
  }
}

/** Items of a sequence field, or an empty list when absent or not a sequence. */
export function sequenceItems(node: DocNode | undefined): DocNode[] {
  return asSequence(node)?.items ?? [];
}

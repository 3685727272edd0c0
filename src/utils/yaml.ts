import YAML from "yaml";
import { fromPlain, toPlain } from "../document/node.js";
import type { DocNode } from "../document/node.js";
import { ParseError } from "../errors.js";

/**
 * Parse YAML (or JSON, which YAML accepts) into a document tree.
 * Throws ParseError carrying `path` when the text does not parse.
 */
export function parsePolicyText(text: string, path: string): DocNode {
  try {
    return fromPlain(YAML.parse(text));
  } catch (err) {
    throw new ParseError(path, err);
  }
}

/**
 * Render a document tree as YAML text. Strings that need quoting use
 * single quotes, so a string port renders as `port: '53'`.
 */
export function renderYaml(node: DocNode): string {
  return YAML.stringify(toPlain(node), { singleQuote: true });
}

/** Render a plain document (such as a generated template) as YAML. */
export function serializeDocument(doc: unknown): string {
  return YAML.stringify(doc, { singleQuote: true });
}

/**
 * YAML helper — wraps the `yaml` package for config parsing
 * and for in-place edits that keep comments and unrelated keys.
 */

import { type Document, isMap, isSeq, parseDocument, stringify as stringifyYaml, visit } from 'yaml';

export function parse(input: string): unknown {
  return toPlain(parseEditable(input));
}

export function stringify(data: unknown): string {
  return stringifyYaml(data);
}

/**
 * Parse into an editable document. Throws the first syntax error,
 * so a broken file is never mistaken for an empty one.
 */
export function parseEditable(input: string): Document {
  const doc = parseDocument(input);
  if (doc.errors.length > 0) {
    throw doc.errors[0];
  }
  return doc;
}

/**
 * Plain value of a document. A number inside a list reads as the text
 * it was written with: `007` stays "007", `0x1F` stays "0x1F" and a
 * long id keeps every digit. The document itself is not touched.
 */
export function toPlain(doc: Document): unknown {
  const copy = doc.clone();
  visit(copy, {
    Scalar(_key, node, path) {
      const parent = path[path.length - 1];
      const numeric = typeof node.value === 'number' || typeof node.value === 'bigint';
      if (numeric && isSeq(parent) && node.source !== undefined) {
        node.value = node.source;
      }
    },
  });
  return copy.toJS();
}

/**
 * Replace `section.key` with a list, creating the section if needed.
 * Everything else in the document is left as it was.
 */
export function setList(doc: Document, section: string, key: string, items: string[]): void {
  const node = doc.get(section, true);
  if (isMap(node)) {
    node.set(key, doc.createNode(items));
    return;
  }
  doc.set(section, doc.createNode({ [key]: items }));
}

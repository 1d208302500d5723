import YAML, { type Document } from "yaml";
import { ParseError, errorMessage } from "../errors.js";
import { ExactNumber, canonicalDecimal, canonicalSerialize } from "../core/canonical.js";
import type { Normalizer } from "./normalizer.js";

/**
 * Replace every numeric scalar with the exact decimal text of its source span,
 * so integers past 2^53 and long fractions keep all their digits.
 * Mapping keys become strings, as a plain object would store them anyway.
 */
function exactNumbers(doc: Document.Parsed, content: string): void {
  YAML.visit(doc, {
    Scalar(key, node) {
      const { value } = node;
      let text: string | null = null;
      if (typeof value === "bigint") {
        text = canonicalDecimal(value.toString());
      } else if (typeof value === "number" && Number.isFinite(value)) {
        const source = node.range ? content.slice(node.range[0], node.range[1]) : String(value);
        text = canonicalDecimal(source.trim()) ?? canonicalDecimal(String(value));
      }
      if (text === null) return;
      node.value = key === "key" ? text : new ExactNumber(text);
    },
  });
}

/** JSON: key order and whitespace are cosmetic. */
export const jsonNormalizer: Normalizer = {
  kind: "json",
  version: "json-canonical/2",
  normalize(content: string, filePath: string): string {
    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch (e) {
      throw new ParseError(filePath, errorMessage(e));
    }
    // JSON is YAML 1.2; reparsing keeps each number's source digits.
    const doc = YAML.parseDocument(content, { schema: "json", intAsBigInt: true, uniqueKeys: false });
    if (doc.errors.length > 0) return canonicalSerialize(value);
    exactNumbers(doc, content);
    return canonicalSerialize(doc.toJS());
  },
};

/** YAML: comments, key order, flow vs block style and anchors are cosmetic. Document order is kept. */
export const yamlNormalizer: Normalizer = {
  kind: "yaml",
  version: "yaml-canonical/2",
  normalize(content: string, filePath: string): string {
    const docs = YAML.parseAllDocuments(content, { intAsBigInt: true });
    const values: unknown[] = [];
    for (const doc of docs) {
      if (doc.errors.length > 0) {
        throw new ParseError(filePath, doc.errors[0].message);
      }
      exactNumbers(doc, content);
      values.push(doc.toJS());
    }
    return values.map((v) => canonicalSerialize(v)).join("\n---\n");
  },
};

import path from "node:path";
import { minimatch } from "minimatch";
import type { FileKind } from "../types/fingerprint.js";
import { ParseError } from "../errors.js";
import { typescriptNormalizer, javascriptNormalizer } from "./typescript.js";
import { pythonNormalizer } from "./python.js";
import { jsonNormalizer, yamlNormalizer } from "./structured-data.js";

/**
 * Reduces one file kind to a canonical, formatting-insensitive text.
 * `normalize` throws ParseError when the content does not parse for the kind.
 */
export type Normalizer = {
  kind: FileKind;
  /** Version tag; part of every semantic hash it produces. */
  version: string;
  normalize(content: string, filePath: string): string;
};

const EXTENSION_KINDS: Record<string, FileKind> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".py": "python",
  ".pyi": "python",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
};

export const DEFAULT_NORMALIZERS: Normalizer[] = [
  typescriptNormalizer,
  javascriptNormalizer,
  pythonNormalizer,
  jsonNormalizer,
  yamlNormalizer,
];

/**
 * Normalizer registry: kind detection and kind → normalizer lookup.
 * Kinds without a normalizer ("unstructured") always take the raw path.
 */
export class NormalizerRegistry {
  private readonly normalizers = new Map<FileKind, Normalizer>();

  constructor(
    normalizers: Normalizer[] = DEFAULT_NORMALIZERS,
    private readonly kindOverrides: Record<string, FileKind> = {},
  ) {
    for (const n of normalizers) this.normalizers.set(n.kind, n);
  }

  /** Declared kind for a path: glob overrides first, then the extension. */
  detectKind(filePath: string): FileKind {
    for (const pattern of Object.keys(this.kindOverrides).sort()) {
      if (minimatch(filePath, pattern, { dot: true })) return this.kindOverrides[pattern];
    }
    return EXTENSION_KINDS[path.posix.extname(filePath).toLowerCase()] ?? "unstructured";
  }

  resolve(kind: FileKind): Normalizer | undefined {
    return this.normalizers.get(kind);
  }

  /** Version tags of every registered normalizer, keyed by kind. */
  versions(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [kind, n] of this.normalizers) out[kind] = n.version;
    return out;
  }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode source bytes for a normalizer: strict UTF-8 with the byte-order mark
 * dropped and line endings unified to LF.
 */
export function decodeSource(content: Buffer, filePath: string): string {
  let text: string;
  try {
    text = utf8.decode(content);
  } catch {
    throw new ParseError(filePath, "content is not valid UTF-8");
  }
  return text.replace(/\r\n?/g, "\n");
}

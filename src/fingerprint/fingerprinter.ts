import type { FileFingerprint, SourceFile } from "../types/fingerprint.js";
import { ParseError, errorMessage } from "../errors.js";
import { decodeSource, type NormalizerRegistry } from "../normalizer/normalizer.js";
import { deepFreeze } from "../core/freeze.js";
import { sha256Hex, sha256Parts } from "./checksum.js";

/**
 * Fingerprint one file. Pure: the result depends only on the bytes, the declared
 * kind and the normalizer version.
 *
 * SEMANTIC when the normalizer accepts the content; RAW_FALLBACK when it raises
 * ParseError or the kind has no normalizer.
 */
export function fingerprintFile(file: SourceFile, registry: NormalizerRegistry): Readonly<FileFingerprint> {
  const rawHash = sha256Hex(file.content);
  const normalizer = registry.resolve(file.kind);

  if (!normalizer) {
    return rawFingerprint(file, rawHash, `no normalizer for kind '${file.kind}'`);
  }

  let canonical: string;
  try {
    canonical = normalizer.normalize(decodeSource(file.content, file.path), file.path);
  } catch (e) {
    if (e instanceof ParseError) return rawFingerprint(file, rawHash, e.message);
    throw new Error(`Normalizer ${normalizer.version} failed on ${file.path}: ${errorMessage(e)}`);
  }

  return deepFreeze<FileFingerprint>({
    path: file.path,
    hash: sha256Parts("semantic", normalizer.version, canonical),
    mode: "SEMANTIC",
    kind: file.kind,
    normalizer: normalizer.version,
    raw_hash: rawHash,
  });
}

function rawFingerprint(file: SourceFile, rawHash: string, reason: string): Readonly<FileFingerprint> {
  return deepFreeze<FileFingerprint>({
    path: file.path,
    hash: sha256Parts("raw", file.content),
    mode: "RAW_FALLBACK",
    kind: file.kind,
    normalizer: "raw",
    raw_hash: rawHash,
    fallback_reason: reason,
  });
}

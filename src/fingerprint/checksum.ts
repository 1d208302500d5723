import { createHash } from "node:crypto";

/** Compute SHA256 hash of a string/buffer. */
export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** SHA256 over NUL-separated parts, so part boundaries are part of the input. */
export function sha256Parts(...parts: Array<string | Buffer>): string {
  const hash = createHash("sha256");
  parts.forEach((part, i) => {
    if (i > 0) hash.update("\0");
    hash.update(part);
  });
  return hash.digest("hex");
}

export const SHA256_PATTERN = /^[a-f0-9]{64}$/;

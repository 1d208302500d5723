import fs from "node:fs";
import path from "node:path";
import type { CertificationReceipt } from "../types/receipt.js";
import { InvalidReceiptInputError, errorMessage } from "../errors.js";
import { DocumentSchemas } from "../schema/documents.js";

/**
 * Export order of receipt fields. Key order carries no meaning for the content
 * hash, but a stable layout keeps published receipts diffable.
 */
export function toExportShape(receipt: CertificationReceipt): CertificationReceipt {
  return {
    engine: { name: receipt.engine.name, version: receipt.engine.version },
    validation: { ...receipt.validation },
    integrity: {
      master_fingerprint: receipt.integrity.master_fingerprint,
      algorithm_version: receipt.integrity.algorithm_version,
    },
    content_hash: receipt.content_hash,
    timestamp: receipt.timestamp,
  };
}

/** Reads and writes <state_dir>/receipt.json, schema-checked both ways. */
export class ReceiptStore {
  constructor(
    private readonly receiptPath: string,
    private schemas?: DocumentSchemas,
  ) {}

  get path(): string {
    return this.receiptPath;
  }

  exists(): boolean {
    return fs.existsSync(this.receiptPath);
  }

  async assertValid(data: unknown, source: string): Promise<void> {
    this.schemas ??= DocumentSchemas.load();
    const { valid, errors } = this.schemas.check("receipt", data);
    if (!valid) throw new InvalidReceiptInputError(`${source}: ${errors}`);
  }

  async write(receipt: CertificationReceipt): Promise<void> {
    const shaped = toExportShape(receipt);
    await this.assertValid(shaped, "receipt");
    fs.mkdirSync(path.dirname(this.receiptPath), { recursive: true });
    fs.writeFileSync(this.receiptPath, JSON.stringify(shaped, null, 2) + "\n", "utf8");
  }

  /** Null when no receipt has been written. */
  async read(): Promise<CertificationReceipt | null> {
    if (!this.exists()) return null;
    return readReceiptFile(this.receiptPath, this.schemas);
  }
}

/** Load a receipt from any path (e.g. one handed over by a third party). */
export async function readReceiptFile(filePath: string, schemas?: DocumentSchemas): Promise<CertificationReceipt> {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new InvalidReceiptInputError(`${filePath}: ${errorMessage(e)}`);
  }
  const { valid, errors } = (schemas ?? DocumentSchemas.load()).check("receipt", data);
  if (!valid) throw new InvalidReceiptInputError(`${filePath}: ${errors}`);
  return data as CertificationReceipt;
}

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import type { AnchorMetadata, OnChainRecord } from "../types/ledger.js";
import { LedgerError, LedgerUnavailableError, errorMessage } from "../errors.js";
import { sha256Parts } from "../fingerprint/checksum.js";
import type { LedgerClient } from "./client.js";
import { parseOnChainRecord } from "./record.js";

type LedgerLine = OnChainRecord & { transaction_id: string };

/**
 * Append-only JSON-lines ledger on local disk. Stands in for a public ledger in
 * offline deployments; every anchor call appends a new transaction.
 */
export class FileLedger implements LedgerClient {
  constructor(
    private readonly ledgerPath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async anchor(contentHash: string, metadata: AnchorMetadata): Promise<string> {
    const blockTimestamp = this.now().toISOString();
    const transactionId = sha256Parts(contentHash, blockTimestamp, crypto.randomBytes(16).toString("hex"));
    const line: LedgerLine = {
      transaction_id: transactionId,
      content_hash: contentHash,
      metadata: { ...metadata },
      block_timestamp: blockTimestamp,
    };
    try {
      fs.mkdirSync(path.dirname(this.ledgerPath), { recursive: true });
      fs.appendFileSync(this.ledgerPath, JSON.stringify(line) + "\n", "utf8");
    } catch (e) {
      throw new LedgerUnavailableError(`Cannot append to ledger ${this.ledgerPath}: ${errorMessage(e)}`);
    }
    return transactionId;
  }

  async fetch(transactionId: string): Promise<OnChainRecord | null> {
    if (!fs.existsSync(this.ledgerPath)) return null;
    const lines = fs.readFileSync(this.ledgerPath, "utf8").split("\n");
    for (const [i, text] of lines.entries()) {
      if (text.trim().length === 0) continue;
      let entry: unknown;
      try {
        entry = JSON.parse(text);
      } catch (e) {
        throw new LedgerError(`${this.ledgerPath}:${i + 1}: ${errorMessage(e)}`);
      }
      const id = entry !== null && typeof entry === "object" && "transaction_id" in entry ? entry.transaction_id : undefined;
      if (id === transactionId) return parseOnChainRecord(entry, `${this.ledgerPath}:${i + 1}`);
    }
    return null;
  }
}

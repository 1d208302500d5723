import type { AnchorMetadata, OnChainRecord } from "../../src/types/ledger.js";
import type { LedgerClient } from "../../src/ledger/client.js";
import { LedgerUnavailableError } from "../../src/errors.js";

/** In-process ledger. `outage` makes every call fail as if the gateway were down. */
export class MemoryLedger implements LedgerClient {
  readonly records = new Map<string, OnChainRecord>();
  outage = false;
  anchorCalls = 0;
  fetchCalls = 0;

  async anchor(contentHash: string, metadata: AnchorMetadata): Promise<string> {
    this.anchorCalls++;
    if (this.outage) throw new LedgerUnavailableError("ledger gateway down");
    const id = `tx-${this.records.size + 1}`;
    this.records.set(id, { content_hash: contentHash, metadata: { ...metadata }, block_timestamp: "2026-04-01T09:00:00.000Z" });
    return id;
  }

  async fetch(transactionId: string): Promise<OnChainRecord | null> {
    this.fetchCalls++;
    if (this.outage) throw new LedgerUnavailableError("ledger gateway down");
    return this.records.get(transactionId) ?? null;
  }
}

export const FAST_RETRY = { timeout_ms: 1_000, max_attempts: 3, base_delay_ms: 1, max_delay_ms: 2 };

import type { AnchorMetadata, LedgerAnchor, OnChainRecord } from "../types/ledger.js";

/**
 * Ledger boundary. The ledger is an opaque append-only publication service;
 * networking, consensus and fees live behind this contract. A call whose
 * signal aborts should stop and publish nothing.
 */
export type LedgerClient = {
  /** Publish a content hash. Every call may yield a new transaction id. */
  anchor(contentHash: string, metadata: AnchorMetadata, signal?: AbortSignal): Promise<string>;
  /** Resolve a transaction id; null when the ledger has no such transaction. */
  fetch(transactionId: string, signal?: AbortSignal): Promise<OnChainRecord | null>;
};

/** One certified fact, however many transactions anchor it. */
export type CertifiedFact = {
  content_hash: string;
  metadata: AnchorMetadata;
  transaction_ids: string[];
  first_anchored_at: string;
};

/**
 * Group anchors by content hash. Resubmitting a receipt anchors the same fact
 * again under a new transaction id, so consumers count facts, not transactions.
 */
export function dedupeByContentHash(anchors: LedgerAnchor[]): CertifiedFact[] {
  const facts = new Map<string, CertifiedFact>();
  for (const anchor of anchors) {
    const fact = facts.get(anchor.content_hash);
    if (!fact) {
      facts.set(anchor.content_hash, {
        content_hash: anchor.content_hash,
        metadata: { ...anchor.metadata },
        transaction_ids: [anchor.transaction_id],
        first_anchored_at: anchor.anchored_at,
      });
      continue;
    }
    if (!fact.transaction_ids.includes(anchor.transaction_id)) fact.transaction_ids.push(anchor.transaction_id);
    if (anchor.anchored_at < fact.first_anchored_at) fact.first_anchored_at = anchor.anchored_at;
  }
  return [...facts.values()].sort((a, b) => a.first_anchored_at.localeCompare(b.first_anchored_at));
}

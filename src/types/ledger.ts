/** Ledger types: what is published on-chain and what is kept locally. */
export type AnchorMetadata = {
  engine_version: string;
  validation_passed: boolean;
  fingerprint: string;
};

export type OnChainRecord = {
  content_hash: string;
  metadata: AnchorMetadata;
  block_timestamp: string;
};

export type LedgerAnchor = {
  content_hash: string;
  metadata: AnchorMetadata;
  transaction_id: string;
  anchored_at: string;
};

export type RetryPolicy = {
  timeout_ms: number;
  max_attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
};

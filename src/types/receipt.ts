/** Certification receipt: the public, whitelisted record of a certification run. */
export type EngineIdentity = {
  name: string;
  version: string;
};

/** Problem class → PASS (true) / FAIL (false). */
export type ValidationResults = Record<string, boolean>;

export type ReceiptIntegrity = {
  master_fingerprint: string;
  algorithm_version: string;
};

export type CertificationReceipt = {
  engine: EngineIdentity;
  validation: ValidationResults;
  integrity: ReceiptIntegrity;
  timestamp: string;
  content_hash: string;
};

export type UnsignedReceipt = Omit<CertificationReceipt, "content_hash">;

import type { AnchorMetadata, OnChainRecord } from "../types/ledger.js";
import { LedgerError, LedgerUnavailableError, errorMessage } from "../errors.js";
import type { LedgerClient } from "./client.js";
import { parseOnChainRecord } from "./record.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Client for a ledger gateway exposing
 *   POST /anchors        { content_hash, metadata } → { transaction_id }
 *   GET  /anchors/:id    → { content_hash, metadata, block_timestamp }
 * Network failures and 5xx responses are LedgerUnavailableError (retriable).
 */
export class HttpLedgerClient implements LedgerClient {
  private readonly baseUrl: string;

  constructor(
    endpoint: string,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init),
  ) {
    this.baseUrl = endpoint.replace(/\/+$/, "");
  }

  async anchor(contentHash: string, metadata: AnchorMetadata, signal?: AbortSignal): Promise<string> {
    const res = await this.request(`${this.baseUrl}/anchors`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ content_hash: contentHash, metadata }),
      signal,
    });
    if (!res.ok) throw this.statusError(res, "anchor");

    const body: unknown = await res.json();
    const id = body !== null && typeof body === "object" && "transaction_id" in body ? body.transaction_id : undefined;
    if (typeof id !== "string" || id.length === 0) {
      throw new LedgerError("Ledger gateway returned no transaction_id");
    }
    return id;
  }

  async fetch(transactionId: string, signal?: AbortSignal): Promise<OnChainRecord | null> {
    const url = `${this.baseUrl}/anchors/${encodeURIComponent(transactionId)}`;
    const res = await this.request(url, { method: "GET", headers: { accept: "application/json" }, signal });
    if (res.status === 404) return null;
    if (!res.ok) throw this.statusError(res, "fetch");
    return parseOnChainRecord(await res.json(), url);
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(url, init);
    } catch (e) {
      throw new LedgerUnavailableError(`Ledger gateway unreachable (${url}): ${errorMessage(e)}`);
    }
  }

  private statusError(res: Response, op: string): Error {
    const message = `Ledger ${op} failed with HTTP ${res.status}`;
    return res.status >= 500 || res.status === 429 ? new LedgerUnavailableError(message) : new LedgerError(message);
  }
}

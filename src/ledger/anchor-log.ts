import fs from "node:fs";
import path from "node:path";
import type { LedgerAnchor } from "../types/ledger.js";
import { LedgerError, errorMessage } from "../errors.js";
import { DocumentSchemas } from "../schema/documents.js";

/** Local record of confirmed anchors (<state_dir>/anchors.json). Entries are never rewritten. */
export class AnchorLog {
  constructor(
    private readonly logPath: string,
    private schemas?: DocumentSchemas,
  ) {}

  get path(): string {
    return this.logPath;
  }

  async list(): Promise<LedgerAnchor[]> {
    if (!fs.existsSync(this.logPath)) return [];

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.logPath, "utf8"));
    } catch (e) {
      throw new LedgerError(`${this.logPath}: ${errorMessage(e)}`);
    }

    this.schemas ??= DocumentSchemas.load();
    const { valid, errors } = this.schemas.check("anchors", data);
    if (!valid) throw new LedgerError(`${this.logPath}: ${errors}`);
    return data as LedgerAnchor[];
  }

  async append(anchor: LedgerAnchor): Promise<LedgerAnchor[]> {
    const anchors = [...(await this.list()), { ...anchor, metadata: { ...anchor.metadata } }];
    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    const tmp = `${this.logPath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(anchors, null, 2) + "\n", "utf8");
    fs.renameSync(tmp, this.logPath);
    return anchors;
  }

  /** Latest anchor for a content hash, if any. */
  async latestFor(contentHash: string): Promise<LedgerAnchor | null> {
    const matches = (await this.list()).filter((a) => a.content_hash === contentHash);
    return matches.length > 0 ? matches[matches.length - 1] : null;
  }
}

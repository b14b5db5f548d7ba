import { appendJsonLine, readJsonLines } from "./lib/files.js";
import type { LedgerRecord } from "./types.js";

export type Ledger = {
  append(record: LedgerRecord): Promise<void>;
};

/** Append-only, one JSON object per line. */
export class NdjsonLedger implements Ledger {
  constructor(readonly filePath: string) {}

  async append(record: LedgerRecord) {
    await appendJsonLine(this.filePath, record);
  }

  async readAll(): Promise<unknown[]> {
    return readJsonLines(this.filePath);
  }
}

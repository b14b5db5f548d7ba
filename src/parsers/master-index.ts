import type { FilingIndexRecord } from "../types.js";

export const MASTER_INDEX_HEADER = "CIK|Company Name|Form Type|Date Filed|Filename";

/**
 * Reads EDGAR `master.idx` text. Everything up to the header row is preamble;
 * after it, only rows with exactly five pipe-separated fields are kept, so the
 * dashed separator and blank lines fall out. A file without the header is an
 * empty period, not an error.
 */
export function parseMasterIndex(text: string): FilingIndexRecord[] {
  const lines = text.split(/\r?\n/);
  const headerIdx = lines.findIndex((line) => line.trim() === MASTER_INDEX_HEADER);
  if (headerIdx < 0) return [];

  const records: FilingIndexRecord[] = [];
  for (const line of lines.slice(headerIdx + 1)) {
    const fields = line.split("|");
    if (fields.length !== 5) continue;
    const [cik, companyName, formType, dateFiled, filename] = fields.map((field) => field.trim());
    records.push({ cik, companyName, formType, dateFiled, filename });
  }
  return records;
}

/** `YYYY-MM-DD` (current) and `YYYYMMDD` (older indexes) → `YYYY-MM-DD`, else null. */
export function normalizeIndexDate(raw: string): string | null {
  const trimmed = raw.trim();
  const dashed = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed);
  if (dashed) return trimmed;
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(trimmed);
  if (compact) return `${compact[1]}-${compact[2]}-${compact[3]}`;
  return null;
}

import { setTimeout as sleep } from "node:timers/promises";
import type { BootstrapStrategy } from "../config.js";
import type { HistorySet } from "../dedup/store.js";
import { errorMessage } from "../lib/errors.js";
import { ACCEPT_TEXT, type Fetcher } from "../lib/http.js";
import type { Ledger } from "../ledger.js";
import type { Logger } from "../logger.js";
import { normalizeIndexDate, parseMasterIndex } from "../parsers/master-index.js";
import type { FilingIndexRecord, HistoricalSource } from "../types.js";
import { archiveUrl, indexPeriods, quarterIndexUrl } from "./periods.js";

export type HistoryDeps = {
  fetcher: Fetcher;
  ledger: Ledger;
  history: HistorySet;
  logger: Logger;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
};

export type BootstrapOptions = {
  archiveBaseUrl: string;
  historyDays: number;
  maxHistoryRows: number;
  strategy: BootstrapStrategy;
  requestDelayMs: number;
};

export type BootstrapResult =
  | { ok: true; admitted: number; periods: number; failedPeriods: number }
  | { ok: false; admitted: number; periods: number; failedPeriods: number; error: string };

type AdmitOptions = {
  source: HistoricalSource;
  archiveBaseUrl: string;
  cutoff: string | null;
  limit: number;
};

type Tally = { admitted: number };

function isInWindow(record: FilingIndexRecord, cutoff: string | null) {
  if (!cutoff) return true;
  const filed = normalizeIndexDate(record.dateFiled);
  return filed !== null && filed >= cutoff;
}

async function admitRecords(
  deps: HistoryDeps,
  records: FilingIndexRecord[],
  options: AdmitOptions,
  tally: Tally
) {
  const now = deps.now ?? (() => new Date());
  let admitted = 0;
  for (const record of records) {
    if (tally.admitted >= options.limit) break;
    if (record.formType !== "4") continue;
    if (!isInWindow(record, options.cutoff)) continue;
    if (!deps.history.isNew(record.filename)) continue;

    await deps.ledger.append({
      source: options.source,
      filename: record.filename,
      url: archiveUrl(options.archiveBaseUrl, record.filename),
      cik: record.cik,
      companyName: record.companyName,
      formType: record.formType,
      dateFiled: record.dateFiled,
      ingestedAt: now().toISOString()
    });
    deps.history.admit(record.filename);
    tally.admitted += 1;
    admitted += 1;
  }
  return admitted;
}

/**
 * One-time historical backfill. Never throws: a failed period is skipped, and
 * anything else that goes wrong is returned as `{ ok: false }` for the caller
 * to record.
 */
export async function runBootstrap(deps: HistoryDeps, options: BootstrapOptions): Promise<BootstrapResult> {
  const logger = deps.logger.child({ module: "bootstrap" });
  const wait = deps.sleep ?? sleep;
  const tally: Tally = { admitted: 0 };
  let attempted = 0;
  let failedPeriods = 0;

  try {
    const now = (deps.now ?? (() => new Date()))();
    const periods = indexPeriods(options.strategy, options.archiveBaseUrl, now, options.historyDays);
    logger.info(
      { strategy: options.strategy, periods: periods.length, historyDays: options.historyDays },
      "bootstrap starting"
    );

    for (const period of periods) {
      if (tally.admitted >= options.maxHistoryRows) {
        logger.info({ maxHistoryRows: options.maxHistoryRows }, "history cap reached; stopping early");
        break;
      }
      if (attempted > 0 && options.requestDelayMs > 0) {
        await wait(options.requestDelayMs);
      }
      attempted += 1;

      let text: string;
      try {
        text = await deps.fetcher(period.url, ACCEPT_TEXT);
      } catch (error) {
        failedPeriods += 1;
        logger.warn({ period: period.label, err: errorMessage(error) }, "index fetch failed; period skipped");
        continue;
      }

      const records = parseMasterIndex(text);
      const admitted = await admitRecords(
        deps,
        records,
        {
          source: "bootstrap",
          archiveBaseUrl: options.archiveBaseUrl,
          cutoff: period.cutoff,
          limit: options.maxHistoryRows
        },
        tally
      );
      logger.info({ period: period.label, rows: records.length, admitted }, "index period ingested");
    }
  } catch (error) {
    logger.error({ err: errorMessage(error), admitted: tally.admitted }, "bootstrap aborted");
    return {
      ok: false,
      admitted: tally.admitted,
      periods: attempted,
      failedPeriods,
      error: errorMessage(error)
    };
  }

  if (attempted > 0 && failedPeriods === attempted) {
    return {
      ok: false,
      admitted: tally.admitted,
      periods: attempted,
      failedPeriods,
      error: `All ${attempted} index periods failed`
    };
  }
  logger.info({ admitted: tally.admitted, failedPeriods }, "bootstrap complete");
  return { ok: true, admitted: tally.admitted, periods: attempted, failedPeriods };
}

/**
 * Manual ingestion of one quarter's `master.idx`, outside the bootstrap gate.
 * Transport and ledger errors propagate.
 */
export async function ingestQuarterIndex(
  deps: HistoryDeps,
  options: { archiveBaseUrl: string; year: number; quarter: number; limit: number }
): Promise<number> {
  const logger = deps.logger.child({ module: "master-index" });
  const url = quarterIndexUrl(options.archiveBaseUrl, options.year, options.quarter);
  const text = await deps.fetcher(url, ACCEPT_TEXT);
  const records = parseMasterIndex(text);
  const admitted = await admitRecords(
    deps,
    records,
    { source: "master.idx", archiveBaseUrl: options.archiveBaseUrl, cutoff: null, limit: options.limit },
    { admitted: 0 }
  );
  logger.info({ url, rows: records.length, admitted }, "quarter index ingested");
  return admitted;
}

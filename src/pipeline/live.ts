import { setTimeout as sleep } from "node:timers/promises";
import { buildAlertMessage } from "../alerts/message.js";
import { shouldAlert } from "../alerts/rule.js";
import type { AlertRule, LiveDedupPolicy } from "../config.js";
import type { LiveIdList } from "../dedup/store.js";
import { errorMessage } from "../lib/errors.js";
import { ACCEPT_HTML, ACCEPT_XML, type Fetcher } from "../lib/http.js";
import type { Ledger } from "../ledger.js";
import type { Logger } from "../logger.js";
import type { Notifier } from "../notify/mailer.js";
import { parseAtomFeed, sortNewestFirst } from "../parsers/atom.js";
import { findAttachmentUrl } from "../parsers/filing-index.js";
import { parseForm4 } from "../parsers/form4.js";
import type { FeedEntry, LiveLedgerRecord } from "../types.js";

export type LiveDeps = {
  fetcher: Fetcher;
  ledger: Ledger;
  liveIds: LiveIdList;
  notifier: Notifier | null;
  logger: Logger;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
};

export type LiveOptions = {
  feedUrl: string;
  maxLiveProcessPerRun: number;
  dedupPolicy: LiveDedupPolicy;
  requestDelayMs: number;
  alert: AlertRule;
};

export type LiveResult = {
  fetched: number;
  fresh: number;
  processed: number;
  ingested: number;
  failed: number;
  alerted: number;
  notified: number;
  skipped: number;
};

type EntryOutcome = { alerted: boolean; notified: boolean };

async function processEntry(
  deps: LiveDeps,
  options: LiveOptions,
  entry: FeedEntry,
  logger: Logger
): Promise<EntryOutcome> {
  if (!entry.indexLink) {
    throw new Error("Entry has no index link");
  }
  const html = await deps.fetcher(entry.indexLink, ACCEPT_HTML);
  const xmlUrl = findAttachmentUrl(html, entry.indexLink);
  if (!xmlUrl) {
    throw new Error("No XML attachment on index page");
  }

  const filing = parseForm4(await deps.fetcher(xmlUrl, ACCEPT_XML));
  const alerted = shouldAlert(options.alert, filing);

  const record: LiveLedgerRecord = {
    source: "live",
    id: entry.id,
    title: entry.title,
    updatedAt: entry.updatedAt,
    indexUrl: entry.indexLink,
    xmlUrl,
    ticker: filing.ticker,
    totalValueUsd: filing.totalValueUsd,
    transactions: filing.transactions.map((tx) => ({
      date: tx.transactionDate,
      code: tx.code,
      shares: tx.shares,
      price: tx.pricePerShare,
      value: tx.value
    })),
    alerted,
    ingestedAt: (deps.now ?? (() => new Date()))().toISOString()
  };
  await deps.ledger.append(record);
  logger.info(
    { id: entry.id, ticker: filing.ticker, totalValueUsd: filing.totalValueUsd, alerted },
    "filing ingested"
  );

  if (!alerted) return { alerted, notified: false };
  if (!deps.notifier) {
    logger.info({ id: entry.id, ticker: filing.ticker }, "alert matched; notification disabled");
    return { alerted, notified: false };
  }

  // Delivery is best-effort: a mail failure does not undo the ingestion.
  try {
    await deps.notifier.send(
      buildAlertMessage(filing, {
        title: entry.title,
        updatedAt: entry.updatedAt,
        indexUrl: entry.indexLink,
        xmlUrl,
        requiredCode: options.alert.requiredCode
      })
    );
    return { alerted, notified: true };
  } catch (error) {
    logger.warn({ id: entry.id, err: errorMessage(error) }, "notification failed");
    return { alerted, notified: false };
  }
}

/**
 * Incremental pass over the live feed. Feed fetch and parse errors propagate;
 * a failure inside one entry is logged and the loop moves on.
 */
export async function runLivePoller(deps: LiveDeps, options: LiveOptions): Promise<LiveResult> {
  const logger = deps.logger.child({ module: "live" });
  const wait = deps.sleep ?? sleep;

  const xml = await deps.fetcher(options.feedUrl, ACCEPT_XML);
  const entries = sortNewestFirst(parseAtomFeed(xml));

  const freshIds = new Set<string>();
  const fresh: FeedEntry[] = [];
  for (const entry of entries) {
    if (freshIds.has(entry.id) || !deps.liveIds.isNew(entry.id)) continue;
    freshIds.add(entry.id);
    fresh.push(entry);
  }

  if (options.dedupPolicy === "mark-seen-before-fetch") {
    deps.liveIds.replace(entries.map((entry) => entry.id));
  }

  const batch = fresh.slice(0, options.maxLiveProcessPerRun);
  logger.info(
    { fetched: entries.length, fresh: fresh.length, processing: batch.length, policy: options.dedupPolicy },
    "live feed fetched"
  );

  const ingestedIds = new Set<string>();
  const result: LiveResult = {
    fetched: entries.length,
    fresh: fresh.length,
    processed: 0,
    ingested: 0,
    failed: 0,
    alerted: 0,
    notified: 0,
    skipped: fresh.length - batch.length
  };

  for (const entry of batch) {
    if (result.processed > 0 && options.requestDelayMs > 0) {
      await wait(options.requestDelayMs);
    }
    result.processed += 1;
    try {
      const outcome = await processEntry(deps, options, entry, logger);
      ingestedIds.add(entry.id);
      result.ingested += 1;
      if (outcome.alerted) result.alerted += 1;
      if (outcome.notified) result.notified += 1;
    } catch (error) {
      result.failed += 1;
      logger.warn({ id: entry.id, link: entry.indexLink, err: errorMessage(error) }, "entry failed; skipped");
    }
  }

  if (options.dedupPolicy === "mark-seen-after-success") {
    deps.liveIds.replace(
      entries.map((entry) => entry.id).filter((id) => !freshIds.has(id) || ingestedIds.has(id))
    );
  }

  logger.info(result, "live poll complete");
  return result;
}

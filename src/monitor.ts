import type { MonitorConfig } from "./config.js";
import { HistorySet, LiveIdList } from "./dedup/store.js";
import type { Fetcher } from "./lib/http.js";
import type { Ledger } from "./ledger.js";
import type { Logger } from "./logger.js";
import type { Notifier } from "./notify/mailer.js";
import { ingestQuarterIndex, runBootstrap, type BootstrapResult } from "./pipeline/bootstrap.js";
import { runLivePoller, type LiveResult } from "./pipeline/live.js";
import type { StateStore } from "./state.js";
import type { MonitorState } from "./types.js";

export type MonitorPhase = "NeedsBootstrap" | "Bootstrapped";

export type MonitorDeps = {
  fetcher: Fetcher;
  ledger: Ledger;
  stateStore: StateStore;
  notifier: Notifier | null;
  logger: Logger;
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
};

export type RunSummary = {
  phase: MonitorPhase;
  bootstrap: BootstrapResult | null;
  live: LiveResult;
};

export function phaseOf(state: MonitorState): MonitorPhase {
  return state.bootstrapDone ? "Bootstrapped" : "NeedsBootstrap";
}

/** One-way: called exactly once, whatever the backfill's outcome. */
export function completeBootstrap(state: MonitorState, result: BootstrapResult, at: Date): MonitorState {
  const next: MonitorState = { ...state, bootstrapDone: true, bootstrapCompletedAt: at.toISOString() };
  if (result.ok) {
    delete next.bootstrapError;
  } else {
    next.bootstrapError = result.error;
  }
  return next;
}

/**
 * One scheduled invocation: backfill once if the state has never been
 * bootstrapped, then poll the live feed. State is saved even when the live
 * pass throws, so a finished backfill is never repeated.
 */
export async function runMonitor(deps: MonitorDeps, config: MonitorConfig): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger.child({ module: "monitor" });

  let state = await deps.stateStore.load();
  const history = new HistorySet(config.maxHistoryRows, state.historySeenFilenames);
  const liveIds = new LiveIdList(config.maxLiveIds, state.seenLiveIds);
  const phase = phaseOf(state);
  logger.info({ phase, seenLiveIds: liveIds.size, historySeen: history.size }, "run starting");

  let bootstrap: BootstrapResult | null = null;
  if (phase === "NeedsBootstrap") {
    bootstrap = await runBootstrap(
      { fetcher: deps.fetcher, ledger: deps.ledger, history, logger: deps.logger, sleep: deps.sleep, now },
      {
        archiveBaseUrl: config.archiveBaseUrl,
        historyDays: config.historyDays,
        maxHistoryRows: config.maxHistoryRows,
        strategy: config.bootstrapStrategy,
        requestDelayMs: config.requestDelayMs
      }
    );
    state = completeBootstrap(state, bootstrap, now());
  }

  try {
    const live = await runLivePoller(
      {
        fetcher: deps.fetcher,
        ledger: deps.ledger,
        liveIds,
        notifier: deps.notifier,
        logger: deps.logger,
        sleep: deps.sleep,
        now
      },
      {
        feedUrl: config.feedUrl,
        maxLiveProcessPerRun: config.maxLiveProcessPerRun,
        dedupPolicy: config.liveDedupPolicy,
        requestDelayMs: config.requestDelayMs,
        alert: config.alert
      }
    );
    return { phase, bootstrap, live };
  } finally {
    await deps.stateStore.save({
      ...state,
      historySeenFilenames: history.snapshot(),
      seenLiveIds: liveIds.snapshot()
    });
  }
}

/** `ingest-index`: one quarter's master.idx into the history set and ledger. */
export async function runIndexIngest(
  deps: MonitorDeps,
  config: MonitorConfig,
  period: { year: number; quarter: number }
): Promise<{ admitted: number }> {
  const state = await deps.stateStore.load();
  const history = new HistorySet(config.maxHistoryRows, state.historySeenFilenames);
  try {
    const admitted = await ingestQuarterIndex(
      { fetcher: deps.fetcher, ledger: deps.ledger, history, logger: deps.logger, now: deps.now },
      {
        archiveBaseUrl: config.archiveBaseUrl,
        year: period.year,
        quarter: period.quarter,
        limit: config.maxHistoryRows
      }
    );
    return { admitted };
  } finally {
    await deps.stateStore.save({ ...state, historySeenFilenames: history.snapshot() });
  }
}

import test from "node:test";
import assert from "node:assert/strict";
import { HttpError } from "../src/lib/errors.js";
import { completeBootstrap, phaseOf, runIndexIngest, runMonitor, type MonitorDeps } from "../src/monitor.js";
import { initialState } from "../src/state.js";
import type { MonitorState } from "../src/types.js";
import {
  MemoryLedger,
  MemoryStateStore,
  RecordingNotifier,
  atomFeed,
  fakeFetcher,
  form4Xml,
  indexPage,
  logger,
  masterIndex,
  testConfig
} from "./helpers.js";

const NOW = new Date("2024-05-15T12:00:00Z");
const BASE = "https://archive.test/Archives";
const FEED = "https://feed.test/atom";
const Q2_URL = `${BASE}/edgar/full-index/2024/QTR2/master.idx`;
const A1_INDEX = "https://sec.test/Archives/edgar/data/900001/A1/A1-index.htm";
const A1_XML = "https://sec.test/Archives/edgar/data/900001/A1/form4.xml";
const HISTORY_FILE = "edgar/data/900004/0000900004-24-000001.txt";

const config = testConfig();

function liveRoutes(): Array<[string, string]> {
  return [
    [FEED, atomFeed([{ id: "A1", link: A1_INDEX, updated: "2024-05-15T07:00:00-04:00" }])],
    [A1_INDEX, indexPage("form4.xml")],
    [A1_XML, form4Xml("acme", [{ date: "2024-05-14", code: "P", shares: "100", price: "2.5" }])]
  ];
}

function setup(routes: Array<[string, string | Error]>, state: MonitorState = initialState()) {
  const { fetcher, calls } = fakeFetcher(new Map(routes));
  const ledger = new MemoryLedger();
  const stateStore = new MemoryStateStore(state);
  const notifier = new RecordingNotifier();
  const deps: MonitorDeps = { fetcher, ledger, stateStore, notifier, logger, now: () => NOW };
  return { deps, calls, ledger, stateStore, notifier };
}

test("the first run backfills history, polls the feed and persists both", async () => {
  const { deps, ledger, stateStore, notifier } = setup([
    [Q2_URL, masterIndex([`900004|DELTA INC|4|2024-05-02|${HISTORY_FILE}`])],
    ...liveRoutes()
  ]);

  const summary = await runMonitor(deps, config);

  assert.equal(summary.phase, "NeedsBootstrap");
  assert.deepEqual(summary.bootstrap, { ok: true, admitted: 1, periods: 2, failedPeriods: 1 });
  assert.equal(summary.live.ingested, 1);
  assert.equal(summary.live.alerted, 1);

  assert.deepEqual(
    ledger.records.map((record) => record.source),
    ["bootstrap", "live"]
  );
  const live = ledger.records[1];
  assert.ok(live.source === "live");
  assert.equal(live.ticker, "ACME");
  assert.equal(live.totalValueUsd, 250);

  assert.equal(notifier.messages.length, 1);
  assert.equal(notifier.messages[0].subject, "Form 4 P ACME $250.00");

  assert.equal(stateStore.saves, 1);
  assert.equal(stateStore.state.bootstrapDone, true);
  assert.equal(stateStore.state.bootstrapCompletedAt, "2024-05-15T12:00:00.000Z");
  assert.equal(stateStore.state.bootstrapError, undefined);
  assert.deepEqual(stateStore.state.historySeenFilenames, [HISTORY_FILE]);
  assert.deepEqual(stateStore.state.seenLiveIds, ["A1"]);
});

test("a failed backfill is recorded and the live pass still runs", async () => {
  const { deps, stateStore } = setup(liveRoutes());

  const summary = await runMonitor(deps, config);

  assert.deepEqual(summary.bootstrap, {
    ok: false,
    admitted: 0,
    periods: 2,
    failedPeriods: 2,
    error: "All 2 index periods failed"
  });
  assert.equal(summary.live.ingested, 1);
  assert.equal(stateStore.state.bootstrapDone, true);
  assert.equal(stateStore.state.bootstrapError, "All 2 index periods failed");
});

test("a bootstrapped state goes straight to the live feed", async () => {
  const { deps, calls } = setup(liveRoutes(), {
    seenLiveIds: ["A1"],
    historySeenFilenames: [HISTORY_FILE],
    bootstrapDone: true,
    bootstrapCompletedAt: "2024-05-14T12:00:00.000Z"
  });

  const summary = await runMonitor(deps, config);

  assert.equal(summary.phase, "Bootstrapped");
  assert.equal(summary.bootstrap, null);
  assert.equal(summary.live.fresh, 0);
  assert.deepEqual(calls, [FEED]);
});

test("two consecutive runs ingest each filing once", async () => {
  const { deps, ledger, stateStore, notifier } = setup(liveRoutes());

  await runMonitor(deps, config);
  const second = await runMonitor(deps, config);

  assert.equal(second.phase, "Bootstrapped");
  assert.equal(second.live.fresh, 0);
  assert.equal(ledger.records.length, 1);
  assert.equal(notifier.messages.length, 1);
  assert.equal(stateStore.saves, 2);
});

test("state is saved even when the live feed fails", async () => {
  const { deps, stateStore } = setup([[Q2_URL, masterIndex([`900004|DELTA INC|4|2024-05-02|${HISTORY_FILE}`])]]);

  await assert.rejects(runMonitor(deps, config), HttpError);

  assert.equal(stateStore.saves, 1);
  assert.equal(stateStore.state.bootstrapDone, true);
  assert.deepEqual(stateStore.state.historySeenFilenames, [HISTORY_FILE]);
});

test("the history cap bounds the persisted filenames", async () => {
  const rows = ["1|A|4|2024-05-01|edgar/data/1/a.txt", "2|B|4|2024-05-02|edgar/data/2/b.txt"];
  const { deps, stateStore } = setup([[Q2_URL, masterIndex(rows)], ...liveRoutes()]);

  await runMonitor(deps, testConfig({ maxHistoryRows: 1 }));

  assert.deepEqual(stateStore.state.historySeenFilenames, ["edgar/data/1/a.txt"]);
});

test("quarter ingest adds to the history set without touching the bootstrap flag", async () => {
  const url = `${BASE}/edgar/full-index/2019/QTR1/master.idx`;
  const { deps, ledger, stateStore } = setup([
    [url, masterIndex(["9|OLD CO|4|2019-01-02|edgar/data/9/old.txt"])]
  ]);

  const result = await runIndexIngest(deps, config, { year: 2019, quarter: 1 });

  assert.deepEqual(result, { admitted: 1 });
  assert.equal(ledger.records[0].source, "master.idx");
  assert.deepEqual(stateStore.state.historySeenFilenames, ["edgar/data/9/old.txt"]);
  assert.equal(stateStore.state.bootstrapDone, false);
});

test("completing the bootstrap is one-way and records the outcome", () => {
  const at = new Date("2024-05-15T12:00:00Z");
  const failed = completeBootstrap(
    initialState(),
    { ok: false, admitted: 0, periods: 2, failedPeriods: 2, error: "All 2 index periods failed" },
    at
  );

  assert.equal(phaseOf(initialState()), "NeedsBootstrap");
  assert.equal(phaseOf(failed), "Bootstrapped");
  assert.equal(failed.bootstrapError, "All 2 index periods failed");

  const cleared = completeBootstrap(failed, { ok: true, admitted: 3, periods: 2, failedPeriods: 0 }, at);
  assert.equal(cleared.bootstrapDone, true);
  assert.equal("bootstrapError" in cleared, false);
  assert.equal(cleared.bootstrapCompletedAt, "2024-05-15T12:00:00.000Z");
});

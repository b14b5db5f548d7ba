import fs from "node:fs";
import { ConfigSchema, type MonitorConfig } from "../src/config.js";
import { HttpError } from "../src/lib/errors.js";
import type { Fetcher } from "../src/lib/http.js";
import type { Ledger } from "../src/ledger.js";
import { silentLogger } from "../src/logger.js";
import type { AlertMessage, Notifier } from "../src/notify/mailer.js";
import { initialState, type StateStore } from "../src/state.js";
import type { LedgerRecord, MonitorState } from "../src/types.js";

export const logger = silentLogger;

export function readFixture(name: string) {
  return fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8");
}

/** Routes map URL → body; an Error value is thrown, a missing URL is a 404. */
export function fakeFetcher(routes: Map<string, string | Error> = new Map()) {
  const calls: string[] = [];
  const fetcher: Fetcher = async (url) => {
    calls.push(url);
    const hit = routes.get(url);
    if (hit === undefined) throw new HttpError(`HTTP 404 for ${url}`, url, 404);
    if (hit instanceof Error) throw hit;
    return hit;
  };
  return { fetcher, calls, routes };
}

export class MemoryLedger implements Ledger {
  records: LedgerRecord[] = [];
  failWith: Error | null = null;

  async append(record: LedgerRecord) {
    if (this.failWith) throw this.failWith;
    this.records.push(record);
  }
}

export class MemoryStateStore implements StateStore {
  saves = 0;

  constructor(public state: MonitorState = initialState()) {}

  async load() {
    return structuredClone(this.state);
  }

  async save(state: MonitorState) {
    this.saves += 1;
    this.state = structuredClone(state);
  }
}

export class RecordingNotifier implements Notifier {
  messages: AlertMessage[] = [];
  failWith: Error | null = null;

  async send(message: AlertMessage) {
    if (this.failWith) throw this.failWith;
    this.messages.push(message);
  }
}

export function testConfig(overrides: Record<string, unknown> = {}): MonitorConfig {
  return ConfigSchema.parse({
    userAgent: "insider-watch-test test@example.com",
    feedUrl: "https://feed.test/atom",
    archiveBaseUrl: "https://archive.test/Archives",
    requestDelayMs: 0,
    ...overrides
  });
}

type TxSpec = {
  date?: string;
  code?: string;
  shares?: string;
  price?: string;
};

function valueTag(tag: string, value: string | undefined) {
  return value === undefined ? "" : `<${tag}><value>${value}</value></${tag}>`;
}

export function form4Xml(ticker: string, transactions: TxSpec[]) {
  const rows = transactions
    .map(
      (tx) => `
    <nonDerivativeTransaction>
      <securityTitle><value>Common Stock</value></securityTitle>
      ${valueTag("transactionDate", tx.date)}
      <transactionCoding>
        <transactionFormType>4</transactionFormType>
        ${tx.code === undefined ? "" : `<transactionCode>${tx.code}</transactionCode>`}
        <equitySwapInvolved>0</equitySwapInvolved>
      </transactionCoding>
      <transactionAmounts>
        ${valueTag("transactionShares", tx.shares)}
        ${valueTag("transactionPricePerShare", tx.price)}
        <transactionAcquiredDisposedCode><value>A</value></transactionAcquiredDisposedCode>
      </transactionAmounts>
    </nonDerivativeTransaction>`
    )
    .join("");
  return `<?xml version="1.0"?>
<ownershipDocument>
  <schemaVersion>X0508</schemaVersion>
  <documentType>4</documentType>
  <issuer>
    <issuerCik>0000900001</issuerCik>
    <issuerName>Example Issuer Inc</issuerName>
    <issuerTradingSymbol>${ticker}</issuerTradingSymbol>
  </issuer>
  <nonDerivativeTable>${rows}
  </nonDerivativeTable>
</ownershipDocument>`;
}

type EntrySpec = {
  id?: string;
  title?: string;
  updated?: string;
  link?: string;
};

export function atomFeed(entries: EntrySpec[]) {
  const body = entries
    .map(
      (entry) => `
  <entry>
    <title>${entry.title ?? "4 - Example Issuer Inc (0000900001) (Issuer)"}</title>
    ${entry.link === undefined ? "" : `<link rel="alternate" type="text/html" href="${entry.link}"/>`}
    <summary type="text">Filed for insider</summary>
    <updated>${entry.updated ?? "2024-03-01T10:00:00-05:00"}</updated>
    <category scheme="https://www.sec.gov/" label="form type" term="4"/>
    ${entry.id === undefined ? "" : `<id>${entry.id}</id>`}
  </entry>`
    )
    .join("");
  return `<?xml version="1.0" encoding="ISO-8859-1" ?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Latest Filings</title>
  <updated>2024-03-01T10:05:00-05:00</updated>${body}
</feed>`;
}

export function indexPage(xmlHref: string) {
  return `<html><body>
<table class="tableFile" summary="Document Format Files">
  <tr><th>Seq</th><th>Description</th><th>Document</th><th>Type</th></tr>
  <tr><td>1</td><td></td><td><a href="xslF345X05/${xmlHref}">${xmlHref.replace(".xml", ".html")}</a></td><td>4</td></tr>
  <tr><td>1</td><td></td><td><a href="${xmlHref}">${xmlHref}</a></td><td>4</td></tr>
</table>
</body></html>`;
}

export function masterIndex(rows: string[]) {
  return [
    "Description:           Master Index of EDGAR Dissemination Feed",
    "Last Data Received:    May 14, 2024",
    "Comments:              webmaster@sec.gov",
    "Anonymous FTP:         ftp://ftp.sec.gov/edgar/",
    "",
    "",
    "",
    "CIK|Company Name|Form Type|Date Filed|Filename",
    "--------------------------------------------------------------------------------",
    ...rows,
    ""
  ].join("\n");
}

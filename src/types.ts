export type FilingIndexRecord = {
  cik: string;
  companyName: string;
  formType: string;
  dateFiled: string;
  filename: string;
};

export type FeedEntry = {
  id: string;
  title: string;
  updatedAt: string;
  indexLink: string | null;
};

export type Transaction = {
  transactionDate: string;
  code: string;
  shares: number;
  pricePerShare: number;
  value: number;
};

export type FilingData = {
  ticker: string;
  transactions: Transaction[];
  totalValueUsd: number;
};

export type HistoricalSource = "bootstrap" | "master.idx";

export type HistoricalLedgerRecord = {
  source: HistoricalSource;
  filename: string;
  url: string;
  cik: string;
  companyName: string;
  formType: string;
  dateFiled: string;
  ingestedAt: string;
};

export type LedgerTransaction = {
  date: string;
  code: string;
  shares: number;
  price: number;
  value: number;
};

export type LiveLedgerRecord = {
  source: "live";
  id: string;
  title: string;
  updatedAt: string;
  indexUrl: string;
  xmlUrl: string;
  ticker: string;
  totalValueUsd: number;
  transactions: LedgerTransaction[];
  alerted: boolean;
  ingestedAt: string;
};

export type LedgerRecord = HistoricalLedgerRecord | LiveLedgerRecord;

export type MonitorState = {
  seenLiveIds: string[];
  historySeenFilenames: string[];
  bootstrapDone: boolean;
  bootstrapCompletedAt?: string;
  bootstrapError?: string;
  updatedAt?: string;
};

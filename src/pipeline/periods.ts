import type { BootstrapStrategy } from "../config.js";

export type IndexPeriod = {
  label: string;
  url: string;
  // Quarterly indexes span more than the window; daily ones do not need a cutoff.
  cutoff: string | null;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function isoDate(date: Date) {
  return date.toISOString().slice(0, 10);
}

export function quarterOf(date: Date) {
  return Math.floor(date.getUTCMonth() / 3) + 1;
}

function trimSlash(url: string) {
  return url.replace(/\/+$/, "");
}

export function quarterIndexUrl(archiveBaseUrl: string, year: number, quarter: number) {
  return `${trimSlash(archiveBaseUrl)}/edgar/full-index/${year}/QTR${quarter}/master.idx`;
}

export function dailyIndexUrl(archiveBaseUrl: string, day: Date) {
  const compact = isoDate(day).replace(/-/g, "");
  return `${trimSlash(archiveBaseUrl)}/edgar/daily-index/${day.getUTCFullYear()}/QTR${quarterOf(
    day
  )}/master.${compact}.idx`;
}

export function archiveUrl(archiveBaseUrl: string, filename: string) {
  return `${trimSlash(archiveBaseUrl)}/${filename.replace(/^\/+/, "")}`;
}

export function windowStart(now: Date, historyDays: number) {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()) - historyDays * DAY_MS);
}

/** Every quarter overlapping [now - historyDays, now], oldest first. */
export function quarterlyPeriods(archiveBaseUrl: string, now: Date, historyDays: number): IndexPeriod[] {
  const start = windowStart(now, historyDays);
  const cutoff = isoDate(start);
  const periods: IndexPeriod[] = [];
  let year = start.getUTCFullYear();
  let quarter = quarterOf(start);
  const endYear = now.getUTCFullYear();
  const endQuarter = quarterOf(now);

  while (year < endYear || (year === endYear && quarter <= endQuarter)) {
    periods.push({ label: `${year}Q${quarter}`, url: quarterIndexUrl(archiveBaseUrl, year, quarter), cutoff });
    quarter += 1;
    if (quarter > 4) {
      quarter = 1;
      year += 1;
    }
  }
  return periods;
}

/**
 * One index per weekday from now - historyDays through yesterday. EDGAR
 * publishes none on weekends, and today's is not out until the day closes.
 */
export function dailyPeriods(archiveBaseUrl: string, now: Date, historyDays: number): IndexPeriod[] {
  const start = windowStart(now, historyDays);
  const periods: IndexPeriod[] = [];
  for (let offset = 0; offset < historyDays; offset += 1) {
    const day = new Date(start.getTime() + offset * DAY_MS);
    const weekday = day.getUTCDay();
    if (weekday === 0 || weekday === 6) continue;
    periods.push({ label: isoDate(day), url: dailyIndexUrl(archiveBaseUrl, day), cutoff: null });
  }
  return periods;
}

export function indexPeriods(
  strategy: BootstrapStrategy,
  archiveBaseUrl: string,
  now: Date,
  historyDays: number
) {
  return strategy === "daily"
    ? dailyPeriods(archiveBaseUrl, now, historyDays)
    : quarterlyPeriods(archiveBaseUrl, now, historyDays);
}

/** "2024Q3" / "2024q3" → { year, quarter }. */
export function parseQuarter(raw: string) {
  const match = /^(\d{4})[Qq]([1-4])$/.exec(raw.trim());
  if (!match) return null;
  return { year: Number(match[1]), quarter: Number(match[2]) };
}

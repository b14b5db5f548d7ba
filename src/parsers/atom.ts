import { child, parseXml, pickLink, textValue, toArray } from "../lib/xml.js";
import type { FeedEntry } from "../types.js";

export function parseAtomFeed(xml: string): FeedEntry[] {
  const parsed = parseXml(xml);
  if (parsed.feed === undefined) return [];

  const entries: FeedEntry[] = [];
  for (const entry of toArray(child(parsed, "feed", "entry"))) {
    const id = textValue(child(entry, "id"));
    if (!id) continue;
    entries.push({
      id,
      title: textValue(child(entry, "title")) ?? "",
      updatedAt: textValue(child(entry, "updated")) ?? "",
      indexLink: pickLink(child(entry, "link"))
    });
  }
  return entries;
}

function timestampOf(entry: FeedEntry) {
  const time = Date.parse(entry.updatedAt);
  return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/** Newest first. Stable, so ties and undated entries keep document order. */
export function sortNewestFirst(entries: FeedEntry[]): FeedEntry[] {
  return [...entries].sort((a, b) => {
    const left = timestampOf(a);
    const right = timestampOf(b);
    if (left === right) return 0;
    return left < right ? 1 : -1;
  });
}

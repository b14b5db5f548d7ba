import { BoundedSet } from "./bounded-set.js";

export type DedupStore<K> = {
  isNew(key: K): boolean;
  admit(key: K): void;
  snapshot(): K[];
};

/** Bootstrap filenames, oldest admitted first. */
export class HistorySet implements DedupStore<string> {
  private readonly set: BoundedSet<string>;

  constructor(capacity: number, filenames: Iterable<string> = []) {
    this.set = new BoundedSet(capacity, filenames);
  }

  get size() {
    return this.set.size;
  }

  isNew(filename: string) {
    return !this.set.has(filename);
  }

  admit(filename: string) {
    this.set.add(filename);
  }

  snapshot() {
    return this.set.values();
  }
}

/**
 * Live feed entry ids, newest first. `replace` mirrors the current feed;
 * `admit` puts a single id at the front.
 */
export class LiveIdList implements DedupStore<string> {
  private ids: string[] = [];
  private index = new Set<string>();

  constructor(
    readonly capacity: number,
    ids: Iterable<string> = []
  ) {
    this.replace(ids);
  }

  get size() {
    return this.ids.length;
  }

  isNew(id: string) {
    return !this.index.has(id);
  }

  admit(id: string) {
    if (this.index.has(id)) return;
    this.replace([id, ...this.ids]);
  }

  replace(ids: Iterable<string>) {
    const next: string[] = [];
    const seen = new Set<string>();
    for (const id of ids) {
      if (next.length >= this.capacity) break;
      if (seen.has(id)) continue;
      seen.add(id);
      next.push(id);
    }
    this.ids = next;
    this.index = seen;
  }

  snapshot() {
    return [...this.ids];
  }
}

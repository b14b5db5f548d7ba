import { z } from "zod";
import { readJsonIfExists, writeJson } from "./lib/files.js";
import type { MonitorState } from "./types.js";

const stringList = z.array(z.string()).catch([]);

// Field-by-field: a damaged field falls back to its default instead of
// discarding the rest of the state.
const StateSchema = z
  .object({
    seenLiveIds: stringList.default([]),
    historySeenFilenames: stringList.default([]),
    bootstrapDone: z.boolean().catch(false).default(false),
    bootstrapCompletedAt: z.string().optional().catch(undefined),
    bootstrapError: z.string().optional().catch(undefined),
    updatedAt: z.string().optional().catch(undefined)
  })
  .catch({ seenLiveIds: [], historySeenFilenames: [], bootstrapDone: false });

export function initialState(): MonitorState {
  return { seenLiveIds: [], historySeenFilenames: [], bootstrapDone: false };
}

export function normalizeState(raw: unknown): MonitorState {
  return StateSchema.parse(raw ?? {});
}

export type StateStore = {
  load(): Promise<MonitorState>;
  save(state: MonitorState): Promise<void>;
};

export class JsonStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  async load() {
    const raw = await readJsonIfExists(this.filePath, null);
    return raw === null ? initialState() : normalizeState(raw);
  }

  async save(state: MonitorState) {
    await writeJson(this.filePath, { ...state, updatedAt: new Date().toISOString() });
  }
}

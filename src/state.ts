// CHANGE: Persist crawl state with atomic writes and schema migration on load.
// WHY: A crash mid-write must leave the previously committed state readable.

import fs from "fs-extra";
import { gunzipSync, gzipSync } from "zlib";
import { FEED, STATE } from "./config.js";
import { StateCorruptError } from "./errors.js";
import { EventStore } from "./events.js";
import { debug } from "./logger.js";
import { migrateState } from "./migrations.js";
import { PendingQueue } from "./pending.js";
import { AppId, JsonValue, RunStats, SeenEntry, Snapshot, StateFile } from "./types.js";

/**
 * In-memory crawl aggregate. Loaded once per run, mutated by the run, saved once at the end.
 *
 * Invariant: `cursor` lies in `[0, ordering.length)` or is reset to 0 before use.
 */
export interface CrawlState {
  cursor: number;
  ordering: AppId[];
  readonly seen: Map<AppId, SeenEntry>;
  readonly pending: PendingQueue;
  readonly snapshots: Map<AppId, Snapshot>;
  readonly events: EventStore;
  lastRun?: RunStats;
  updatedAt: string;
}

export interface StateStats {
  readonly cursor: number;
  readonly orderingSize: number;
  readonly seen: number;
  readonly detected: number;
  readonly pending: number;
  readonly snapshots: number;
  readonly newEvents: number;
  readonly changeEvents: number;
  readonly updatedAt: string;
  readonly lastRun?: RunStats;
}

export function createEmptyState(eventCap: number = FEED.MAX_EVENTS): CrawlState {
  return {
    cursor: 0,
    ordering: [],
    seen: new Map(),
    pending: new PendingQueue(),
    snapshots: new Map(),
    events: new EventStore([], [], eventCap),
    updatedAt: ""
  };
}

function keyedToMap<T>(record: { readonly [id: string]: T }): Map<AppId, T> {
  return new Map(Object.entries(record).map(([id, value]) => [Number(id), value]));
}

function mapToKeyed<T>(map: ReadonlyMap<AppId, T>): { [id: string]: T } {
  const out: { [id: string]: T } = {};
  for (const [id, value] of [...map].sort(([a], [b]) => a - b)) {
    out[String(id)] = value;
  }
  return out;
}

export function hydrateState(file: StateFile, eventCap: number = FEED.MAX_EVENTS): CrawlState {
  return {
    cursor: file.cursor,
    ordering: [...file.ordering],
    seen: keyedToMap(file.seen),
    pending: new PendingQueue(file.pending),
    snapshots: keyedToMap(file.snapshots),
    events: new EventStore(file.newEvents, file.changeEvents, eventCap),
    lastRun: file.lastRun,
    updatedAt: file.updatedAt
  };
}

export function serializeState(state: CrawlState, updatedAt: string): StateFile {
  return {
    version: STATE.VERSION,
    updatedAt,
    cursor: state.cursor,
    seen: mapToKeyed(state.seen),
    pending: state.pending.toArray(),
    snapshots: mapToKeyed(state.snapshots),
    newEvents: [...state.events.listNew()],
    changeEvents: [...state.events.listChanges()],
    ordering: [...state.ordering],
    lastRun: state.lastRun
  };
}

export function summarizeState(state: CrawlState): StateStats {
  return {
    cursor: state.cursor,
    orderingSize: state.ordering.length,
    seen: state.seen.size,
    detected: [...state.seen.values()].filter(entry => entry.everDetected).length,
    pending: state.pending.size,
    snapshots: state.snapshots.size,
    newEvents: state.events.listNew().length,
    changeEvents: state.events.listChanges().length,
    updatedAt: state.updatedAt,
    lastRun: state.lastRun
  };
}

/**
 * File-backed crawl state. Paths ending in `.gz` are gzip-compressed.
 */
export class StateStore {
  constructor(
    readonly path: string = STATE.PATH,
    private readonly eventCap: number = FEED.MAX_EVENTS
  ) {}

  private get compressed(): boolean {
    return this.path.endsWith(".gz");
  }

  /**
   * Load state from disk, or an empty state when no file exists yet.
   *
   * @throws StateCorruptError when the file exists but cannot be parsed or migrated.
   */
  async load(): Promise<CrawlState> {
    if (!(await fs.pathExists(this.path))) {
      debug(`State file ${this.path} absent, starting with empty state.`);
      return createEmptyState(this.eventCap);
    }
    let file: StateFile;
    try {
      const buffer = await fs.readFile(this.path);
      const text = this.compressed ? gunzipSync(buffer).toString("utf8") : buffer.toString("utf8");
      const raw: JsonValue = JSON.parse(text);
      file = migrateState(raw);
    } catch (error) {
      throw new StateCorruptError(this.path, error);
    }
    const state = hydrateState(file, this.eventCap);
    debug(`Loaded state: ${state.seen.size} seen, ${state.pending.size} pending, cursor ${state.cursor}`);
    return state;
  }

  /**
   * Persist state atomically by writing to a temporary file before rename.
   */
  async save(state: CrawlState, now: Date = new Date()): Promise<void> {
    const payload = serializeState(state, now.toISOString());
    const text = JSON.stringify(payload);
    const data = this.compressed ? gzipSync(Buffer.from(text, "utf8")) : text;
    const tempPath = `${this.path}.tmp`;
    try {
      await fs.outputFile(tempPath, data);
      // rename(2) replaces the target in one step; a crash leaves either the old or the new file.
      await fs.rename(tempPath, this.path);
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }
    state.updatedAt = payload.updatedAt;
    debug(`State saved to ${this.path} (${state.seen.size} seen, ${state.pending.size} pending).`);
  }

  /**
   * Counters of the persisted state, for display.
   */
  async stats(): Promise<StateStats> {
    return summarizeState(await this.load());
  }

  /**
   * Remove the persisted state.
   */
  async clear(): Promise<void> {
    await fs.remove(this.path);
    await fs.remove(`${this.path}.tmp`);
  }
}

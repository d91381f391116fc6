// CHANGE: Verify state persistence, migration and corruption handling.
// WHY: A failed write must leave the committed state loadable.

import fs from "fs-extra";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StateCorruptError } from "../src/errors.js";
import { buildNewEvent } from "../src/events.js";
import { extractSnapshot } from "../src/snapshot.js";
import { CrawlState, StateStore, createEmptyState } from "../src/state.js";
import { makeRecord } from "./support/fakes.js";

const STAMP = "2024-05-01T00:00:00.000Z";

function populatedState(): CrawlState {
  const state = createEmptyState();
  state.ordering = [10, 11, 12];
  state.cursor = 2;
  state.seen.set(10, { everDetected: true, detectedAt: STAMP });
  state.seen.set(11, { everDetected: false });
  state.pending.add(11);
  state.snapshots.set(10, extractSnapshot(makeRecord(10)));
  state.events.recordNew(buildNewEvent(makeRecord(10), STAMP));
  return state;
}

describe("StateStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), "catalog-watch-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("starts empty when no state file exists", async () => {
    const state = await new StateStore(path.join(dir, "missing.json")).load();
    expect(state.cursor).toBe(0);
    expect(state.seen.size).toBe(0);
    expect(state.pending.size).toBe(0);
    expect(state.events.listNew()).toEqual([]);
  });

  it("round-trips a saved state", async () => {
    const store = new StateStore(path.join(dir, "state.json"));
    await store.save(populatedState(), new Date(STAMP));
    const loaded = await store.load();
    expect(loaded.cursor).toBe(2);
    expect(loaded.ordering).toEqual([10, 11, 12]);
    expect(loaded.seen.get(10)).toEqual({ everDetected: true, detectedAt: STAMP });
    expect(loaded.seen.get(11)).toEqual({ everDetected: false });
    expect(loaded.pending.toArray()).toEqual([11]);
    expect(loaded.snapshots.get(10)).toEqual(extractSnapshot(makeRecord(10)));
    expect(loaded.events.listNew().map(event => event.key)).toEqual(["new:10"]);
    expect(loaded.updatedAt).toBe(STAMP);
  });

  it("stores gzip-compressed state for .gz paths", async () => {
    const file = path.join(dir, "state.json.gz");
    const store = new StateStore(file);
    await store.save(populatedState(), new Date(STAMP));
    const raw = await fs.readFile(file);
    expect([raw[0], raw[1]]).toEqual([0x1f, 0x8b]);
    expect((await store.load()).seen.size).toBe(2);
  });

  it("migrates legacy seen layouts", async () => {
    const file = path.join(dir, "legacy.json");
    await fs.writeFile(
      file,
      JSON.stringify({ seen: { "10": true, "11": false }, seen_ids: [12], cursor: 1, ordering: [10, 11, 12] })
    );
    const state = await new StateStore(file).load();
    expect(state.seen.get(10)).toEqual({ everDetected: true });
    expect(state.seen.get(11)).toEqual({ everDetected: false });
    expect(state.seen.get(12)).toEqual({ everDetected: true });
    expect(state.cursor).toBe(1);
    expect(state.pending.size).toBe(0);
  });

  it("raises StateCorruptError for unreadable files instead of resetting", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{not json");
    await expect(new StateStore(file).load()).rejects.toBeInstanceOf(StateCorruptError);
  });

  it("raises StateCorruptError for unknown future versions", async () => {
    const file = path.join(dir, "future.json");
    await fs.writeFile(file, JSON.stringify({ version: 99 }));
    await expect(new StateStore(file).load()).rejects.toThrow("unsupported state version 99");
  });

  it("leaves the previous state loadable when the replace step fails", async () => {
    const file = path.join(dir, "state.json");
    const store = new StateStore(file);
    await store.save(populatedState(), new Date(STAMP));

    const next = populatedState();
    next.cursor = 0;
    next.seen.set(99, { everDetected: false });
    vi.spyOn(fs, "rename").mockImplementationOnce(async () => {
      throw new Error("simulated crash");
    });
    await expect(store.save(next)).rejects.toThrow("simulated crash");

    const loaded = await store.load();
    expect(loaded.cursor).toBe(2);
    expect(loaded.seen.has(99)).toBe(false);
    expect(await fs.pathExists(`${file}.tmp`)).toBe(false);
  });

  it("clears the persisted file", async () => {
    const file = path.join(dir, "state.json");
    const store = new StateStore(file);
    await store.save(populatedState());
    await store.clear();
    expect(await fs.pathExists(file)).toBe(false);
    expect((await store.stats()).seen).toBe(0);
  });
});

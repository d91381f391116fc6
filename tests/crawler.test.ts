// CHANGE: Exercise full crawl runs against in-process sources.
// WHY: Covers cursor movement, dedup, deadline and persistence on failure.

import fs from "fs-extra";
import { tmpdir } from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CrawlOptions, crawlOnce, runCrawl } from "../src/crawler.js";
import { StateCorruptError } from "../src/errors.js";
import { FetchContext, PacingOptions } from "../src/fetcher.js";
import { extractSnapshot } from "../src/snapshot.js";
import { CrawlState, StateStore, createEmptyState } from "../src/state.js";
import { AppId } from "../src/types.js";
import { seededRandom } from "../src/utils/sampling.js";
import { FakeClock, FakeDetails, FakeListing, US, alwaysFound, makeRecord, noPacing } from "./support/fakes.js";

const STAMP = "2024-05-01T00:00:00.000Z";

const options: CrawlOptions = {
  batchSize: 10,
  newArrivalsCap: 10,
  pendingCap: 10,
  deadlineMs: 0,
  locales: [US]
};

function contextFor(clock: FakeClock = new FakeClock(Date.parse(STAMP)), pacing: PacingOptions = noPacing): FetchContext {
  return new FetchContext(pacing, clock, seededRandom(1));
}

function knownState(ids: readonly AppId[]): CrawlState {
  const state = createEmptyState();
  state.ordering = [...ids];
  for (const id of ids) {
    state.seen.set(id, { everDetected: true, detectedAt: STAMP });
    state.snapshots.set(id, extractSnapshot(makeRecord(id)));
  }
  return state;
}

const range = (count: number): AppId[] => Array.from({ length: count }, (_, index) => index + 1);

describe("crawlOnce", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("discovers new arrivals once and advances past the rolling window", async () => {
    const state = createEmptyState();
    const details = alwaysFound();
    const stats = await crawlOnce(state, {
      listing: new FakeListing([3, 1, 2]),
      details,
      context: contextFor(),
      options
    });

    expect(details.requestedIds()).toEqual([1, 2, 3]);
    expect(stats).toMatchObject({ attempted: 3, discovered: 3, changed: 0, listingRefreshed: true });
    expect(state.events.listNew().map(event => event.key)).toEqual(["new:3", "new:2", "new:1"]);
    expect(state.seen.get(1)).toEqual({ everDetected: true, detectedAt: STAMP });
    expect(state.cursor).toBe(0);
  });

  it("wraps the rolling window and stores the next cursor", async () => {
    const state = knownState(range(10));
    state.cursor = 8;
    const details = alwaysFound();
    await crawlOnce(state, {
      listing: new FakeListing(range(10)),
      details,
      context: contextFor(),
      options: { ...options, batchSize: 5 }
    });
    expect(details.requestedIds()).toEqual([9, 10, 1, 2, 3]);
    expect(state.cursor).toBe(3);
    expect(state.events.listChanges()).toEqual([]);
  });

  it("parks a rate-limited new arrival in pending without a New event", async () => {
    const state = createEmptyState();
    await crawlOnce(state, {
      listing: new FakeListing([42]),
      details: new FakeDetails(() => ({ kind: "rate_limited" })),
      context: contextFor(),
      options
    });
    expect(state.events.listNew()).toEqual([]);
    expect(state.pending.toArray()).toEqual([42]);
    expect(state.seen.get(42)).toEqual({ everDetected: false });

    const stats = await crawlOnce(state, {
      listing: new FakeListing([42]),
      details: alwaysFound(),
      context: contextFor(),
      options
    });
    expect(stats.discovered).toBe(1);
    expect(state.pending.size).toBe(0);
    expect(state.events.listNew().map(event => event.key)).toEqual(["new:42"]);
  });

  it("processes an identifier reached through two paths only once", async () => {
    const state = createEmptyState();
    state.pending.add(7);
    const details = alwaysFound();
    await crawlOnce(state, { listing: new FakeListing([7]), details, context: contextFor(), options });
    expect(details.requestedIds()).toEqual([7]);

    await crawlOnce(state, { listing: new FakeListing([7]), details, context: contextFor(), options });
    expect(details.requestedIds()).toEqual([7, 7]);
    expect(state.events.listNew()).toHaveLength(1);
    expect(state.events.listChanges()).toHaveLength(0);
  });

  it("emits one change event per detected difference", async () => {
    const state = createEmptyState();
    state.ordering = [5];
    state.seen.set(5, { everDetected: true, detectedAt: STAMP });
    state.snapshots.set(5, extractSnapshot(makeRecord(5, { supportedLanguages: "English, French" })));
    const details = alwaysFound(() => ({ supportedLanguages: "English, Japanese" }));

    const first = await crawlOnce(state, { listing: new FakeListing([5]), details, context: contextFor(), options });
    const second = await crawlOnce(state, { listing: new FakeListing([5]), details, context: contextFor(), options });

    expect(first.changed).toBe(1);
    expect(second.changed).toBe(0);
    const [event] = state.events.listChanges();
    expect(state.events.listChanges()).toHaveLength(1);
    expect(event?.key).toBe(`changed:5:${STAMP}`);
    expect(event?.summary).toBe("Languages: +japanese -french");
  });

  it("stops before the deadline and advances only past attempted identifiers", async () => {
    const state = knownState(range(10));
    const details = alwaysFound();
    const stats = await crawlOnce(state, {
      listing: new FakeListing(range(10)),
      details,
      context: contextFor(new FakeClock(0), { ...noPacing, minSpacingMs: 100 }),
      options: { ...options, deadlineMs: 250 }
    });
    expect(details.requestedIds()).toEqual([1, 2, 3]);
    expect(stats.stoppedByDeadline).toBe(true);
    expect(stats.attempted).toBe(3);
    expect(state.cursor).toBe(3);
  });

  it("keeps the cached ordering when the listing is unavailable", async () => {
    const state = knownState([4, 5]);
    const details = alwaysFound();
    const stats = await crawlOnce(state, {
      listing: new FakeListing(new Error("HTTP 502")),
      details,
      context: contextFor(),
      options
    });
    expect(stats.listingRefreshed).toBe(false);
    expect(state.ordering).toEqual([4, 5]);
    expect(details.requestedIds()).toEqual([4, 5]);
  });

  it("isolates a failing identifier from the rest of the batch", async () => {
    const state = createEmptyState();
    const details = new FakeDetails(id => {
      const record = makeRecord(id);
      if (id !== 2) {
        return { kind: "found", record };
      }
      return {
        kind: "found",
        record: {
          ...record,
          get name(): string {
            throw new Error("malformed record");
          }
        }
      };
    });
    const stats = await crawlOnce(state, { listing: new FakeListing([1, 2, 3]), details, context: contextFor(), options });
    expect(stats.discovered).toBe(2);
    expect(state.events.listNew().map(event => event.id)).toEqual([3, 1]);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

/**
 * Throws from `now()` on the second call after being armed.
 */
class FailingClock extends FakeClock {
  private countdown = 0;

  arm(): void {
    this.countdown = 2;
  }

  now(): number {
    if (this.countdown > 0) {
      this.countdown -= 1;
      if (this.countdown === 0) {
        throw new Error("clock failure");
      }
    }
    return super.now();
  }
}

describe("runCrawl", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    dir = await fs.mkdtemp(path.join(tmpdir(), "catalog-watch-crawl-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("loads, crawls and saves state", async () => {
    const store = new StateStore(path.join(dir, "state.json"));
    const result = await runCrawl({
      store,
      listing: new FakeListing([1, 2]),
      details: alwaysFound(),
      options,
      pacing: noPacing,
      clock: new FakeClock(Date.parse(STAMP))
    });
    expect(result.stats.discovered).toBe(2);

    const reloaded = await store.load();
    expect(reloaded.events.listNew().map(event => event.key)).toEqual(["new:2", "new:1"]);
    expect(reloaded.lastRun?.discovered).toBe(2);
    expect(reloaded.updatedAt).toBe(STAMP);
  });

  it("saves progress made before a failure", async () => {
    const store = new StateStore(path.join(dir, "state.json"));
    const clock = new FailingClock(Date.parse(STAMP));
    const details = new FakeDetails(id => {
      if (id === 2) {
        clock.arm();
      }
      return { kind: "found", record: makeRecord(id) };
    });

    await expect(
      runCrawl({ store, listing: new FakeListing([1, 2, 3]), details, options, pacing: noPacing, clock })
    ).rejects.toThrow("clock failure");

    const reloaded = await store.load();
    expect([...reloaded.seen.keys()]).toEqual([1, 2]);
    expect(reloaded.events.listNew()).toHaveLength(2);
    expect(reloaded.lastRun).toBeUndefined();
  });

  it("reports the run failure when saving partial progress also fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const store = new StateStore(path.join(dir, "state.json"));
    const save = vi.spyOn(store, "save").mockRejectedValue(new Error("disk full"));
    const clock = new FailingClock(Date.parse(STAMP));
    const details = new FakeDetails(id => {
      if (id === 2) {
        clock.arm();
      }
      return { kind: "found", record: makeRecord(id) };
    });

    await expect(
      runCrawl({ store, listing: new FakeListing([1, 2, 3]), details, options, pacing: noPacing, clock })
    ).rejects.toThrow("clock failure");

    expect(save).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("Failed to save state after run failure: disk full");
  });

  it("aborts on a corrupt state file without overwriting it", async () => {
    const file = path.join(dir, "state.json");
    await fs.writeFile(file, "{not json");
    const details = alwaysFound();
    await expect(
      runCrawl({ store: new StateStore(file), listing: new FakeListing([1]), details, options, pacing: noPacing })
    ).rejects.toBeInstanceOf(StateCorruptError);
    expect(details.requests).toHaveLength(0);
    expect(await fs.readFile(file, "utf8")).toBe("{not json");
  });
});

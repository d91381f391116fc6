// CHANGE: Verify event builders and bounded event history.
// WHY: Feeds must never exceed the cap or repeat a first-sight event.

import { describe, expect, it, vi } from "vitest";
import { EventStore, buildChangeEvent, buildNewEvent, pushBounded } from "../src/events.js";
import { storeLink } from "../src/utils/url.js";
import { makeRecord } from "./support/fakes.js";

const STAMP = "2024-05-01T00:00:00.000Z";

describe("pushBounded", () => {
  it("prepends and drops the oldest beyond the cap", () => {
    const cap = 3;
    let events = [1, 2, 3].map(id => buildNewEvent(makeRecord(id), STAMP));
    events = events.reduce<typeof events>((acc, event) => pushBounded(acc, event, cap), []);
    const next = pushBounded(events, buildNewEvent(makeRecord(4), STAMP), cap);
    expect(next.map(event => event.id)).toEqual([4, 3, 2]);
    expect(events.map(event => event.id)).toEqual([3, 2, 1]);
  });
});

describe("EventStore", () => {
  it("keeps at most cap events per stream", () => {
    const store = new EventStore([], [], 2);
    for (const id of [1, 2, 3]) {
      store.recordNew(buildNewEvent(makeRecord(id), STAMP));
    }
    expect(store.listNew().map(event => event.id)).toEqual([3, 2]);
  });

  it("refuses a second New event for the same identifier", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const store = new EventStore();
    expect(store.recordNew(buildNewEvent(makeRecord(8), STAMP))).toBe(true);
    expect(store.recordNew(buildNewEvent(makeRecord(8), "2024-05-02T00:00:00.000Z"))).toBe(false);
    expect(store.listNew()).toHaveLength(1);
    expect(store.listNew()[0]?.timestamp).toBe(STAMP);
  });

  it("keeps change events independent from new events", () => {
    const store = new EventStore();
    store.recordNew(buildNewEvent(makeRecord(8), STAMP));
    store.recordChange(buildChangeEvent(makeRecord(8), [{ field: "price", before: "1000", after: "800" }], STAMP));
    expect(store.listNew()).toHaveLength(1);
    expect(store.listChanges()).toHaveLength(1);
  });
});

describe("event builders", () => {
  it("builds a New event with price and release details", () => {
    const event = buildNewEvent(makeRecord(5), STAMP);
    expect(event.key).toBe("new:5");
    expect(event.kind).toBe("new");
    expect(event.title).toBe("Test Game 5");
    expect(event.summary).toBe("New store page");
    expect(event.link).toBe(storeLink(5));
    expect(event.payload).toEqual({
      description: "A test game.",
      releaseText: "Released: 1 Jan, 2024",
      priceText: "10.00 USD"
    });
  });

  it("formats zero-decimal currencies and free items", () => {
    const yen = buildNewEvent(
      makeRecord(5, { price: { currency: "JPY", initial: 1200, final: 1200, discountPercent: 0 } }),
      STAMP
    );
    expect(yen.payload.priceText).toBe("1200 JPY");
    const free = buildNewEvent(makeRecord(6, { isFree: true, price: undefined }), STAMP);
    expect(free.payload.priceText).toBe("Free to Play");
  });

  it("keys change events by identifier and timestamp", () => {
    const event = buildChangeEvent(
      makeRecord(5),
      [{ field: "languages", before: "english", after: "english, japanese" }],
      STAMP
    );
    expect(event.key).toBe(`changed:5:${STAMP}`);
    expect(event.summary).toBe("Languages: +japanese");
    expect(event.title).toBe("Test Game 5: Languages: +japanese");
    expect(event.payload.changes).toHaveLength(1);
  });
});

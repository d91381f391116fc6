// CHANGE: Bounded, most-recent-first event history for discoveries and changes.
// WHY: The feed consumes a fixed-size window and a first-sight event must never appear twice.

import { FEED } from "./config.js";
import { debug } from "./logger.js";
import { summarizeChanges } from "./snapshot.js";
import { CrawlEvent, EventPayload, FieldChange, ItemRecord } from "./types.js";
import { storeLink, stripVolatileQuery } from "./utils/url.js";

const DESCRIPTION_LIMIT = 500;

/**
 * Prepend then truncate.
 *
 * @returns New array holding at most `cap` events, newest first.
 */
export function pushBounded(events: readonly CrawlEvent[], event: CrawlEvent, cap: number): CrawlEvent[] {
  return [event, ...events].slice(0, Math.max(0, cap));
}

function formatPrice(record: ItemRecord): string | undefined {
  if (record.isFree) {
    return "Free to Play";
  }
  if (!record.price) {
    return undefined;
  }
  const { final, currency } = record.price;
  // Zero-decimal currencies are reported in whole units.
  if (currency.toUpperCase() === "JPY" || currency.toUpperCase() === "KRW") {
    return `${final} ${currency}`;
  }
  return `${(final / 100).toFixed(2)} ${currency}`;
}

function formatRelease(record: ItemRecord): string | undefined {
  if (!record.release) {
    return undefined;
  }
  if (record.release.comingSoon) {
    return record.release.date ? `Coming soon: ${record.release.date}` : "Coming soon";
  }
  return record.release.date ? `Released: ${record.release.date}` : undefined;
}

function basePayload(record: ItemRecord): EventPayload {
  return {
    description: record.shortDescription?.trim().slice(0, DESCRIPTION_LIMIT),
    releaseText: formatRelease(record),
    priceText: formatPrice(record)
  };
}

/**
 * First-sight event for a newly published item.
 */
export function buildNewEvent(record: ItemRecord, timestamp: string): CrawlEvent {
  return {
    key: `new:${record.id}`,
    id: record.id,
    kind: "new",
    title: record.name,
    summary: "New store page",
    link: storeLink(record.id),
    timestamp,
    image: record.headerImage ? stripVolatileQuery(record.headerImage) : undefined,
    payload: basePayload(record)
  };
}

/**
 * Change event carrying the diff against the last persisted snapshot.
 */
export function buildChangeEvent(record: ItemRecord, changes: readonly FieldChange[], timestamp: string): CrawlEvent {
  const summary = summarizeChanges(changes);
  return {
    key: `changed:${record.id}:${timestamp}`,
    id: record.id,
    kind: "changed",
    title: `${record.name}: ${summary}`,
    summary,
    link: storeLink(record.id),
    timestamp,
    image: record.headerImage ? stripVolatileQuery(record.headerImage) : undefined,
    payload: { ...basePayload(record), changes: [...changes] }
  };
}

/**
 * Two independent bounded sequences, newest first.
 */
export class EventStore {
  private newEvents: CrawlEvent[];
  private changeEvents: CrawlEvent[];

  constructor(
    initialNew: readonly CrawlEvent[] = [],
    initialChanges: readonly CrawlEvent[] = [],
    private readonly cap: number = FEED.MAX_EVENTS
  ) {
    this.newEvents = initialNew.slice(0, cap);
    this.changeEvents = initialChanges.slice(0, cap);
  }

  /**
   * Insert a New event unless its identifier already has one in the current window.
   *
   * @returns Whether the event was inserted.
   */
  recordNew(event: CrawlEvent): boolean {
    if (this.newEvents.some(existing => existing.id === event.id || existing.link === event.link)) {
      debug(`Skipping duplicate new event for ${event.id}`);
      return false;
    }
    this.newEvents = pushBounded(this.newEvents, event, this.cap);
    return true;
  }

  recordChange(event: CrawlEvent): void {
    this.changeEvents = pushBounded(this.changeEvents, event, this.cap);
  }

  listNew(): readonly CrawlEvent[] {
    return this.newEvents;
  }

  listChanges(): readonly CrawlEvent[] {
    return this.changeEvents;
  }
}

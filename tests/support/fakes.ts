// CHANGE: In-process fakes for clock, listing and detail sources.
// WHY: Tests stay deterministic and never touch the network.

import { Clock, PacingOptions } from "../../src/fetcher.js";
import { AppId, DetailOutcome, DetailSource, ItemRecord, ListingSource, StoreLocale } from "../../src/types.js";

export const US: StoreLocale = { language: "english", countryCode: "US" };
export const JP: StoreLocale = { language: "english", countryCode: "JP" };

export const noPacing: PacingOptions = {
  minSpacingMs: 0,
  slowSpacingMs: 0,
  slowModeCooldownMs: 0,
  retries: 3,
  retryBaseMs: 0,
  retryMaxMs: 0
};

/**
 * Manual clock: `sleep` advances time instantly and records the delay.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(delayMs: number): Promise<void> {
    this.sleeps.push(delayMs);
    this.current += delayMs;
  }
}

export function makeRecord(id: AppId, overrides: Partial<ItemRecord> = {}): ItemRecord {
  return {
    id,
    name: `Test Game ${id}`,
    type: "game",
    isFree: false,
    price: { currency: "USD", initial: 1000, final: 1000, discountPercent: 0 },
    supportedLanguages: "English",
    headerImage: `https://cdn.example.test/apps/${id}/header.jpg`,
    screenshots: [],
    shortDescription: "A test game.",
    detailedDescription: "A longer test description.",
    release: { comingSoon: false, date: "1 Jan, 2024" },
    genres: ["Action"],
    platforms: ["windows"],
    locale: US,
    ...overrides
  };
}

export class FakeListing implements ListingSource {
  calls = 0;

  constructor(private readonly ids: AppId[] | Error) {}

  async listAllIdentifiers(): Promise<AppId[]> {
    this.calls += 1;
    if (this.ids instanceof Error) {
      throw this.ids;
    }
    return [...this.ids];
  }
}

type Responder = (id: AppId, locale: StoreLocale) => DetailOutcome;

/**
 * Detail source answering from a responder; records every request.
 */
export class FakeDetails implements DetailSource {
  readonly requests: Array<{ id: AppId; locale: StoreLocale }> = [];

  constructor(private readonly respond: Responder) {}

  async fetchDetails(id: AppId, locale: StoreLocale): Promise<DetailOutcome> {
    this.requests.push({ id, locale });
    return this.respond(id, locale);
  }

  requestedIds(): AppId[] {
    return this.requests.map(request => request.id);
  }
}

export function alwaysFound(overrides: (id: AppId) => Partial<ItemRecord> = () => ({})): FakeDetails {
  return new FakeDetails((id, locale) => ({ kind: "found", record: makeRecord(id, { ...overrides(id), locale }) }));
}

// CHANGE: Centralise configuration source with environment validation.
// WHY: Run bounds, pacing and storage paths must be fixed for the whole run before any request goes out.

import * as dotenv from "dotenv";
import { StoreLocale } from "./types.js";

dotenv.config();

function intFromEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}. Received: ${raw}`);
  }
  return value;
}

/**
 * Parse a `language:COUNTRY` comma-separated list.
 *
 * @param raw - Value such as `english:JP,english:GB`.
 * @returns Locales in declared order; malformed pairs are rejected.
 */
export function parseLocaleList(raw: string): StoreLocale[] {
  return raw
    .split(",")
    .map(part => part.trim())
    .filter(part => part !== "")
    .map(part => {
      const [language, countryCode] = part.split(":").map(token => token.trim());
      if (!language || !countryCode) {
        throw new Error(`Malformed locale "${part}", expected language:COUNTRY`);
      }
      return { language, countryCode: countryCode.toUpperCase() };
    });
}

/**
 * Store endpoints used by the listing and detail sources.
 */
export const SOURCES = {
  APP_LIST: process.env.APP_LIST_URL ?? "https://api.steampowered.com/ISteamApps/GetAppList/v2/",
  APP_DETAILS: process.env.APP_DETAILS_URL ?? "https://store.steampowered.com/api/appdetails",
  STORE_APP: process.env.STORE_APP_URL ?? "https://store.steampowered.com/app"
} as const;

/**
 * Primary locale plus the ordered fallbacks tried when an item is not visible in the primary region.
 */
export const LOCALES: { readonly PRIMARY: StoreLocale; readonly FALLBACKS: readonly StoreLocale[] } = {
  PRIMARY: {
    language: process.env.STORE_LANGUAGE ?? "english",
    countryCode: (process.env.STORE_COUNTRY ?? "US").toUpperCase()
  },
  FALLBACKS: parseLocaleList(process.env.STORE_FALLBACK_LOCALES ?? "english:JP,english:GB")
};

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY` is at least 1 and `SLOW_SPACING_MS` is used only while slow mode is active.
 */
export const NET = {
  TIMEOUT: intFromEnv("HTTP_TIMEOUT", 15_000, 1),
  CONCURRENCY: intFromEnv("HTTP_CONCURRENCY", 1, 1),
  MIN_SPACING_MS: intFromEnv("HTTP_MIN_SPACING_MS", 300),
  SLOW_SPACING_MS: intFromEnv("HTTP_SLOW_SPACING_MS", 2_000),
  SLOW_COOLDOWN_MS: intFromEnv("HTTP_SLOW_COOLDOWN_MS", 60_000),
  RETRIES: intFromEnv("HTTP_RETRIES", 3),
  RETRY_BASE_MS: intFromEnv("HTTP_RETRY_BASE_MS", 1_000),
  RETRY_MAX_MS: intFromEnv("HTTP_RETRY_MAX_MS", 30_000)
} as const;

/**
 * Per-run work bounds.
 */
export const CRAWL = {
  BATCH_SIZE: intFromEnv("ITEMS_PER_RUN", 300),
  NEW_ARRIVALS_CAP: intFromEnv("NEW_ARRIVALS_PER_RUN", 100),
  PENDING_CAP: intFromEnv("PENDING_PER_RUN", 100),
  DEADLINE_SECONDS: intFromEnv("CRAWL_DEADLINE_SECONDS", 540)
} as const;

/**
 * Event history bounds and feed output paths.
 */
export const FEED = {
  MAX_EVENTS: intFromEnv("FEED_MAX_EVENTS", 300, 1),
  NEW_PATH: process.env.FEED_NEW_PATH ?? "feed_new.xml",
  CHANGES_PATH: process.env.FEED_CHANGES_PATH ?? "feed_updates.xml"
} as const;

/**
 * State persistence settings. Paths ending in `.gz` are stored gzip-compressed.
 */
export const STATE = {
  PATH: process.env.STATE_PATH ?? "state/crawl-state.json",
  VERSION: 2
} as const;

// CHANGE: Implement the store-facing listing and detail sources.
// WHY: The crawler only sees identifiers and typed ItemRecords; HTTP status handling stays here.

import axios from "axios";
import { SOURCES } from "./config.js";
import { ListingUnavailableError, toErrorMessage } from "./errors.js";
import { debug } from "./logger.js";
import { AppId, DetailOutcome, DetailSource, ItemRecord, JsonValue, ListingSource, StoreLocale } from "./types.js";
import { getJson, retryAfterMs } from "./utils/http.js";

type JsonRecord = { readonly [key: string]: JsonValue };

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: JsonValue): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function toAppId(value: JsonValue): AppId | undefined {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value.trim(), 10);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
  }
  return undefined;
}

/**
 * Extract identifiers from a `GetAppList` payload.
 *
 * @throws Error when the payload does not contain `applist.apps`.
 */
export function toIdentifierList(payload: JsonValue): AppId[] {
  if (!isRecord(payload) || !isRecord(payload.applist) || !Array.isArray(payload.applist.apps)) {
    throw new Error("Malformed app list: missing applist.apps");
  }
  const apps: readonly JsonValue[] = payload.applist.apps;
  const ids: AppId[] = [];
  for (const app of apps) {
    const id = isRecord(app) ? toAppId(app.appid) : undefined;
    if (id !== undefined) {
      ids.push(id);
    }
  }
  return ids;
}

function toStringList(value: JsonValue, pick: (entry: JsonRecord) => JsonValue): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const entries: readonly JsonValue[] = value;
  return entries.flatMap(entry => {
    if (!isRecord(entry)) {
      return [];
    }
    const picked = optionalString(pick(entry));
    return picked ? [picked] : [];
  });
}

/**
 * Convert the `data` node of an `appdetails` response into an {@link ItemRecord}.
 *
 * @returns Record or undefined when the node has no usable name.
 */
export function toItemRecord(id: AppId, data: JsonValue, locale: StoreLocale): ItemRecord | undefined {
  if (!isRecord(data)) {
    return undefined;
  }
  const name = optionalString(data.name);
  if (!name) {
    return undefined;
  }
  const price = isRecord(data.price_overview) ? data.price_overview : undefined;
  const release = isRecord(data.release_date) ? data.release_date : undefined;
  const platforms = isRecord(data.platforms) ? data.platforms : undefined;
  return {
    id,
    name,
    type: optionalString(data.type),
    isFree: data.is_free === true,
    price:
      price && typeof price.final === "number" && typeof price.currency === "string"
        ? {
            currency: price.currency,
            initial: typeof price.initial === "number" ? price.initial : price.final,
            final: price.final,
            discountPercent: typeof price.discount_percent === "number" ? price.discount_percent : 0
          }
        : undefined,
    supportedLanguages: optionalString(data.supported_languages),
    headerImage: optionalString(data.header_image),
    screenshots: toStringList(data.screenshots, entry => entry.path_full),
    shortDescription: optionalString(data.short_description),
    detailedDescription: optionalString(data.detailed_description),
    release: release
      ? { comingSoon: release.coming_soon === true, date: optionalString(release.date) }
      : undefined,
    genres: toStringList(data.genres, entry => entry.description),
    platforms: platforms
      ? Object.entries(platforms)
          .filter(([, enabled]) => enabled === true)
          .map(([platform]) => platform)
      : [],
    locale
  };
}

/**
 * Classify an `appdetails` body for one identifier.
 */
export function classifyDetailsPayload(id: AppId, payload: JsonValue, locale: StoreLocale): DetailOutcome {
  // The store answers `null` instead of an object while it is shedding load.
  if (payload === null || payload === undefined || payload === "") {
    return { kind: "transient", reason: "empty response body" };
  }
  if (!isRecord(payload)) {
    return { kind: "transient", reason: "malformed response body" };
  }
  const node = payload[String(id)];
  if (!isRecord(node) || node.success !== true) {
    return { kind: "not_found" };
  }
  const record = toItemRecord(id, node.data, locale);
  return record ? { kind: "found", record } : { kind: "not_found" };
}

/**
 * Map a failed details request onto an outcome.
 */
export function classifyDetailsError(error: unknown): DetailOutcome {
  if (!axios.isAxiosError(error)) {
    return { kind: "transient", reason: toErrorMessage(error) };
  }
  const status = error.response?.status;
  if (status === undefined) {
    return { kind: "transient", reason: error.code ?? error.message };
  }
  // 403 is how the store throttles appdetails callers.
  if (status === 429 || status === 403) {
    return { kind: "rate_limited", retryAfterMs: retryAfterMs(error) };
  }
  if (status >= 500) {
    return { kind: "transient", reason: `HTTP ${status}` };
  }
  return { kind: "not_found" };
}

/**
 * Store HTTP API exposed as listing and detail sources.
 */
export class StoreApi implements ListingSource, DetailSource {
  constructor(
    private readonly listUrl: string = SOURCES.APP_LIST,
    private readonly detailsUrl: string = SOURCES.APP_DETAILS
  ) {}

  async listAllIdentifiers(): Promise<AppId[]> {
    try {
      const response = await getJson<JsonValue>(this.listUrl);
      const ids = toIdentifierList(response.data);
      debug(`Fetched app list with ${ids.length} identifiers (status ${response.status})`);
      return ids;
    } catch (error) {
      throw new ListingUnavailableError(error);
    }
  }

  async fetchDetails(id: AppId, locale: StoreLocale): Promise<DetailOutcome> {
    try {
      const response = await getJson<JsonValue>(this.detailsUrl, {
        params: { appids: String(id), l: locale.language, cc: locale.countryCode },
        attempts: 1
      });
      return classifyDetailsPayload(id, response.data, locale);
    } catch (error) {
      return classifyDetailsError(error);
    }
  }
}

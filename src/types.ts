// CHANGE: Define strongly typed domain models for the rolling catalog crawl.
// WHY: Snapshots, events and persisted state share one set of shapes across fetch, diff and storage.

/**
 * JSON-like value type used for parsed payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Catalog identifier. Positive integer assigned by the store.
 */
export type AppId = number;

/**
 * Language/region pair used when asking the store for item details.
 */
export interface StoreLocale {
  readonly language: string;
  readonly countryCode: string;
}

/**
 * Price as reported by the store, in minor currency units.
 */
export interface PriceOverview {
  readonly currency: string;
  readonly initial: number;
  readonly final: number;
  readonly discountPercent: number;
}

export interface ReleaseInfo {
  readonly comingSoon: boolean;
  readonly date?: string;
}

/**
 * Raw attribute set of one catalog item as returned by a successful details fetch.
 *
 * Transient: never persisted, only projected into a {@link Snapshot}.
 */
export interface ItemRecord {
  readonly id: AppId;
  readonly name: string;
  readonly type?: string;
  readonly isFree: boolean;
  readonly price?: PriceOverview;
  readonly supportedLanguages?: string;
  readonly headerImage?: string;
  readonly screenshots: readonly string[];
  readonly shortDescription?: string;
  readonly detailedDescription?: string;
  readonly release?: ReleaseInfo;
  readonly genres: readonly string[];
  readonly platforms: readonly string[];
  readonly locale: StoreLocale;
}

/**
 * Normalized, comparable projection of an {@link ItemRecord}.
 *
 * Invariant: list fields are sorted and free of duplicates, free text is stored as a digest.
 */
export interface Snapshot {
  readonly nameDigest: string;
  readonly descriptionDigest: string;
  readonly price: number | null;
  readonly currency: string | null;
  readonly isFree: boolean;
  readonly languages: readonly string[];
  readonly genres: readonly string[];
  readonly platforms: readonly string[];
  readonly type: string | null;
  readonly releaseDate: string | null;
  readonly comingSoon: boolean;
  readonly images: readonly string[];
}

export type SnapshotField = keyof Snapshot;

/**
 * One differing field between two snapshots, rendered for display.
 */
export interface FieldChange {
  readonly field: SnapshotField;
  readonly before: string;
  readonly after: string;
}

/**
 * Per-identifier discovery record.
 *
 * @property everDetected - Whether the identifier has ever resolved to a published item.
 * @property detectedAt - ISO timestamp of the first successful resolution.
 */
export interface SeenEntry {
  readonly everDetected: boolean;
  readonly detectedAt?: string;
}

export type EventKind = "new" | "changed";

/**
 * Extra details a feed renderer may show alongside an event.
 */
export interface EventPayload {
  readonly description?: string;
  readonly releaseText?: string;
  readonly priceText?: string;
  readonly changes?: readonly FieldChange[];
}

/**
 * Detected discovery or change, ready for publication.
 *
 * @property key - Stable identity: `new:<id>` or `changed:<id>:<timestamp>`.
 */
export interface CrawlEvent {
  readonly key: string;
  readonly id: AppId;
  readonly kind: EventKind;
  readonly title: string;
  readonly summary: string;
  readonly link: string;
  readonly timestamp: string;
  readonly image?: string;
  readonly payload: EventPayload;
}

/**
 * Counters describing the last completed run.
 */
export interface RunStats {
  readonly finishedAt: string;
  readonly orderingSize: number;
  readonly attempted: number;
  readonly discovered: number;
  readonly changed: number;
  readonly pending: number;
  readonly stoppedByDeadline: boolean;
  readonly listingRefreshed: boolean;
}

/**
 * Shape of the persisted state file (schema version 2).
 */
export interface StateFile {
  readonly version: number;
  readonly updatedAt: string;
  readonly cursor: number;
  readonly seen: { readonly [id: string]: SeenEntry };
  readonly pending: readonly AppId[];
  readonly snapshots: { readonly [id: string]: Snapshot };
  readonly newEvents: readonly CrawlEvent[];
  readonly changeEvents: readonly CrawlEvent[];
  readonly ordering: readonly AppId[];
  readonly lastRun?: RunStats;
}

/**
 * Result of one details request for one locale.
 *
 * `not_found` is terminal for that locale; `rate_limited` and `transient` may be retried.
 */
export type DetailOutcome =
  | { readonly kind: "found"; readonly record: ItemRecord }
  | { readonly kind: "not_found" }
  | { readonly kind: "rate_limited"; readonly retryAfterMs?: number }
  | { readonly kind: "transient"; readonly reason: string };

/**
 * Full identifier listing of the catalog.
 */
export interface ListingSource {
  listAllIdentifiers(): Promise<AppId[]>;
}

/**
 * Per-identifier details lookup.
 */
export interface DetailSource {
  fetchDetails(id: AppId, locale: StoreLocale): Promise<DetailOutcome>;
}

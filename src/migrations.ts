// CHANGE: Versioned migration of persisted state into the current schema.
// WHY: Legacy seen-set layouts are translated once at load; nothing else branches on old shapes.

import { STATE } from "./config.js";
import { FIELD_LABELS } from "./snapshot.js";
import {
  AppId,
  CrawlEvent,
  EventPayload,
  FieldChange,
  JsonValue,
  RunStats,
  SeenEntry,
  Snapshot,
  SnapshotField,
  StateFile
} from "./types.js";

type JsonRecord = { readonly [key: string]: JsonValue };

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSnapshotField(value: string): value is SnapshotField {
  return Object.prototype.hasOwnProperty.call(FIELD_LABELS, value);
}

function expectRecord(value: JsonValue, where: string): JsonRecord {
  if (!isRecord(value)) {
    throw new Error(`${where} must be an object`);
  }
  return value;
}

function expectArray(value: JsonValue, where: string): readonly JsonValue[] {
  if (!Array.isArray(value)) {
    throw new Error(`${where} must be an array`);
  }
  const items: readonly JsonValue[] = value;
  return items;
}

function expectString(value: JsonValue, where: string): string {
  if (typeof value !== "string") {
    throw new Error(`${where} must be a string`);
  }
  return value;
}

function optionalString(value: JsonValue, where: string): string | undefined {
  return value === undefined || value === null ? undefined : expectString(value, where);
}

function nullableString(value: JsonValue, where: string): string | null {
  return value === undefined || value === null ? null : expectString(value, where);
}

function expectBoolean(value: JsonValue, where: string): boolean {
  if (typeof value !== "boolean") {
    throw new Error(`${where} must be a boolean`);
  }
  return value;
}

function expectInteger(value: JsonValue, where: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new Error(`${where} must be an integer`);
  }
  return value;
}

function expectAppId(value: JsonValue, where: string): AppId {
  const id = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
  const parsed = expectInteger(id, where);
  if (parsed <= 0) {
    throw new Error(`${where} must be a positive identifier`);
  }
  return parsed;
}

function expectStringArray(value: JsonValue, where: string): string[] {
  return expectArray(value, where).map((item, index) => expectString(item, `${where}[${index}]`));
}

function parseSeenEntry(value: JsonValue, where: string): SeenEntry {
  const record = expectRecord(value, where);
  const detectedAt = optionalString(record.detectedAt, `${where}.detectedAt`);
  const everDetected = expectBoolean(record.everDetected, `${where}.everDetected`);
  return detectedAt === undefined ? { everDetected } : { everDetected, detectedAt };
}

export function parseSnapshot(value: JsonValue, where: string): Snapshot {
  const record = expectRecord(value, where);
  const price = record.price;
  if (price !== null && price !== undefined && typeof price !== "number") {
    throw new Error(`${where}.price must be a number or null`);
  }
  return {
    nameDigest: expectString(record.nameDigest, `${where}.nameDigest`),
    descriptionDigest: expectString(record.descriptionDigest, `${where}.descriptionDigest`),
    price: price ?? null,
    currency: nullableString(record.currency, `${where}.currency`),
    isFree: expectBoolean(record.isFree, `${where}.isFree`),
    languages: expectStringArray(record.languages, `${where}.languages`),
    genres: expectStringArray(record.genres, `${where}.genres`),
    platforms: expectStringArray(record.platforms, `${where}.platforms`),
    type: nullableString(record.type, `${where}.type`),
    releaseDate: nullableString(record.releaseDate, `${where}.releaseDate`),
    comingSoon: expectBoolean(record.comingSoon, `${where}.comingSoon`),
    images: expectStringArray(record.images, `${where}.images`)
  };
}

function parseFieldChange(value: JsonValue, where: string): FieldChange {
  const record = expectRecord(value, where);
  const field = expectString(record.field, `${where}.field`);
  if (!isSnapshotField(field)) {
    throw new Error(`${where}.field has unknown value ${field}`);
  }
  return {
    field,
    before: expectString(record.before, `${where}.before`),
    after: expectString(record.after, `${where}.after`)
  };
}

function parsePayload(value: JsonValue, where: string): EventPayload {
  if (value === undefined || value === null) {
    return {};
  }
  const record = expectRecord(value, where);
  return {
    description: optionalString(record.description, `${where}.description`),
    releaseText: optionalString(record.releaseText, `${where}.releaseText`),
    priceText: optionalString(record.priceText, `${where}.priceText`),
    changes:
      record.changes === undefined
        ? undefined
        : expectArray(record.changes, `${where}.changes`).map((item, index) =>
            parseFieldChange(item, `${where}.changes[${index}]`)
          )
  };
}

export function parseEvent(value: JsonValue, where: string): CrawlEvent {
  const record = expectRecord(value, where);
  const kind = expectString(record.kind, `${where}.kind`);
  if (kind !== "new" && kind !== "changed") {
    throw new Error(`${where}.kind has unknown value ${kind}`);
  }
  return {
    key: expectString(record.key, `${where}.key`),
    id: expectAppId(record.id, `${where}.id`),
    kind,
    title: expectString(record.title, `${where}.title`),
    summary: expectString(record.summary, `${where}.summary`),
    link: expectString(record.link, `${where}.link`),
    timestamp: expectString(record.timestamp, `${where}.timestamp`),
    image: optionalString(record.image, `${where}.image`),
    payload: parsePayload(record.payload, `${where}.payload`)
  };
}

function parseRunStats(value: JsonValue): RunStats | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const { finishedAt, orderingSize, attempted, discovered, changed, pending, stoppedByDeadline, listingRefreshed } = value;
  if (
    typeof finishedAt !== "string" ||
    typeof orderingSize !== "number" ||
    typeof attempted !== "number" ||
    typeof discovered !== "number" ||
    typeof changed !== "number" ||
    typeof pending !== "number"
  ) {
    return undefined;
  }
  return {
    finishedAt,
    orderingSize,
    attempted,
    discovered,
    changed,
    pending,
    stoppedByDeadline: stoppedByDeadline === true,
    listingRefreshed: listingRefreshed === true
  };
}

function parseKeyed<T>(value: JsonValue, where: string, parse: (item: JsonValue, at: string) => T): { [id: string]: T } {
  const out: { [id: string]: T } = {};
  for (const [key, item] of Object.entries(expectRecord(value, where))) {
    const id = expectAppId(key, `${where} key ${key}`);
    out[String(id)] = parse(item, `${where}.${key}`);
  }
  return out;
}

/**
 * Validate a current-version state document.
 *
 * @throws Error naming the first malformed field.
 */
export function parseStateFile(raw: JsonRecord): StateFile {
  return {
    version: expectInteger(raw.version, "version"),
    updatedAt: optionalString(raw.updatedAt, "updatedAt") ?? "",
    cursor: expectInteger(raw.cursor, "cursor"),
    seen: parseKeyed(raw.seen, "seen", parseSeenEntry),
    pending: expectArray(raw.pending, "pending").map((item, index) => expectAppId(item, `pending[${index}]`)),
    snapshots: parseKeyed(raw.snapshots, "snapshots", parseSnapshot),
    newEvents: expectArray(raw.newEvents, "newEvents").map((item, index) => parseEvent(item, `newEvents[${index}]`)),
    changeEvents: expectArray(raw.changeEvents, "changeEvents").map((item, index) =>
      parseEvent(item, `changeEvents[${index}]`)
    ),
    ordering: expectArray(raw.ordering, "ordering").map((item, index) => expectAppId(item, `ordering[${index}]`)),
    lastRun: parseRunStats(raw.lastRun)
  };
}

/**
 * Version 1 kept the seen-set as a direct mapping (`{ "570": true }`) or as a `seen_ids` array.
 */
function migrateV1ToV2(raw: JsonRecord): JsonRecord {
  const seen: { [id: string]: JsonValue } = {};
  if (isRecord(raw.seen)) {
    for (const [id, value] of Object.entries(raw.seen)) {
      seen[id] = isRecord(value) ? value : { everDetected: value === true };
    }
  }
  if (Array.isArray(raw.seen_ids)) {
    const seenIds: readonly JsonValue[] = raw.seen_ids;
    for (const id of seenIds) {
      if (typeof id === "number" || typeof id === "string") {
        seen[String(id)] = { everDetected: true };
      }
    }
  }
  return {
    version: 2,
    updatedAt: typeof raw.updatedAt === "string" ? raw.updatedAt : "",
    cursor: typeof raw.cursor === "number" ? raw.cursor : 0,
    seen,
    pending: raw.pending ?? [],
    snapshots: raw.snapshots ?? {},
    newEvents: raw.newEvents ?? [],
    changeEvents: raw.changeEvents ?? [],
    ordering: raw.ordering ?? []
  };
}

const MIGRATIONS: Record<number, (raw: JsonRecord) => JsonRecord> = {
  1: migrateV1ToV2
};

/**
 * Bring a parsed state document up to {@link STATE.VERSION} and validate it.
 *
 * Documents without a `version` field are treated as version 1.
 *
 * @throws Error for unknown future versions or malformed documents.
 */
export function migrateState(raw: JsonValue, targetVersion: number = STATE.VERSION): StateFile {
  let current = expectRecord(raw, "state");
  let version = current.version === undefined ? 1 : expectInteger(current.version, "version");
  if (version > targetVersion) {
    throw new Error(`unsupported state version ${version} (expected <= ${targetVersion})`);
  }
  while (version < targetVersion) {
    const step = MIGRATIONS[version];
    if (!step) {
      throw new Error(`no migration from state version ${version}`);
    }
    current = step(current);
    version += 1;
  }
  return parseStateFile(current);
}

// CHANGE: Reduce item records to comparable snapshots and diff them field by field.
// WHY: A change event is emitted only when a projected field differs from the last persisted snapshot.

import { load } from "cheerio";
import { FieldChange, ItemRecord, Snapshot, SnapshotField } from "./types.js";
import { textDigest } from "./utils/hashing.js";
import { stripVolatileQuery } from "./utils/url.js";

const LANGUAGE_SEPARATORS = /[,;/\n\r]+/;

const LANGUAGE_BOILERPLATE: readonly RegExp[] = [
  /languages with full audio support/g,
  /full audio/g,
  /subtitles/g,
  /interface/g
];

/**
 * Order in which changes are reported; most significant first.
 */
export const FIELD_ORDER: readonly SnapshotField[] = [
  "price",
  "currency",
  "languages",
  "descriptionDigest",
  "images",
  "nameDigest",
  "isFree",
  "genres",
  "platforms",
  "releaseDate",
  "comingSoon",
  "type"
];

export const FIELD_LABELS: Record<SnapshotField, string> = {
  price: "Price",
  currency: "Currency",
  languages: "Languages",
  descriptionDigest: "Description",
  images: "Images",
  nameDigest: "Title",
  isFree: "Free to play",
  genres: "Genres",
  platforms: "Platforms",
  releaseDate: "Release date",
  comingSoon: "Coming soon",
  type: "Type"
};

const SET_FIELDS: ReadonlySet<SnapshotField> = new Set<SnapshotField>(["languages", "genres", "platforms"]);
const OPAQUE_FIELDS: ReadonlySet<SnapshotField> = new Set<SnapshotField>(["descriptionDigest", "nameDigest", "images"]);

export const SUMMARY_LIMIT = 3;

function toSortedSet(values: readonly string[]): string[] {
  return [...new Set(values.filter(value => value !== ""))].sort();
}

function normalizeText(text: string | undefined): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Parse the supported-languages markup fragment into a sorted language set.
 *
 * @param fragment - Markup such as `English<strong>*</strong>, French<br>...`.
 * @returns Lower-cased, de-duplicated, sorted language names.
 */
export function parseLanguages(fragment: string | undefined): string[] {
  if (!fragment || fragment.trim() === "") {
    return [];
  }
  const $ = load(fragment, null, false);
  $("br").replaceWith("\n");
  const text = $.root().text();
  const languages = text.split(LANGUAGE_SEPARATORS).map(part => {
    let value = part.toLowerCase();
    for (const pattern of LANGUAGE_BOILERPLATE) {
      value = value.replace(pattern, " ");
    }
    return value.replace(/[*()[\]]/g, " ").replace(/\s+/g, " ").trim();
  });
  return toSortedSet(languages);
}

/**
 * Drop volatile cache-busting parameters from embedded media URLs.
 *
 * Markup without such parameters is returned untouched so its digest stays stable.
 */
export function normalizeMarkup(markup: string | undefined): string {
  if (!markup || !markup.includes("src")) {
    return normalizeText(markup);
  }
  const $ = load(markup, null, false);
  let rewritten = false;
  $("[src]").each((_, element) => {
    const node = $(element);
    const source = node.attr("src") ?? "";
    const stable = stripVolatileQuery(source);
    if (stable !== source) {
      node.attr("src", stable);
      rewritten = true;
    }
  });
  return normalizeText(rewritten ? $.html() : markup);
}

/**
 * Project an item record onto the fields relevant to change detection.
 *
 * Pure: identical records always produce equal snapshots.
 */
export function extractSnapshot(record: ItemRecord): Snapshot {
  const description = [normalizeText(record.shortDescription), normalizeMarkup(record.detailedDescription)].join("\n");
  const images = [record.headerImage ?? "", ...record.screenshots]
    .map(url => url.trim())
    .filter(url => url !== "")
    .map(stripVolatileQuery);
  return {
    nameDigest: textDigest(normalizeText(record.name)),
    descriptionDigest: textDigest(description),
    price: record.price?.final ?? null,
    currency: record.price?.currency ?? null,
    isFree: record.isFree,
    languages: parseLanguages(record.supportedLanguages),
    genres: toSortedSet(record.genres.map(genre => normalizeText(genre).toLowerCase())),
    platforms: toSortedSet(record.platforms.map(platform => platform.trim().toLowerCase())),
    type: record.type ?? null,
    releaseDate: record.release?.date ?? null,
    comingSoon: record.release?.comingSoon ?? false,
    images: toSortedSet(images)
  };
}

function renderValue(value: Snapshot[SnapshotField] | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return toSortedSet(value).join(", ");
}

/**
 * Compare two snapshots field by field.
 *
 * List fields are compared as sets. The result follows {@link FIELD_ORDER} and is empty iff the
 * snapshots are semantically equal.
 */
export function diffSnapshots(before: Snapshot, after: Snapshot): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of FIELD_ORDER) {
    const previous = renderValue(before[field]);
    const current = renderValue(after[field]);
    if (previous !== current) {
      changes.push({ field, before: previous, after: current });
    }
  }
  return changes;
}

function splitList(rendered: string): string[] {
  return rendered === "" ? [] : rendered.split(", ");
}

/**
 * Short human-readable label for one change.
 */
export function describeChange(change: FieldChange): string {
  const label = FIELD_LABELS[change.field];
  if (OPAQUE_FIELDS.has(change.field)) {
    return `${label} updated`;
  }
  if (SET_FIELDS.has(change.field)) {
    const before = new Set(splitList(change.before));
    const after = new Set(splitList(change.after));
    const added = [...after].filter(value => !before.has(value)).map(value => `+${value}`);
    const removed = [...before].filter(value => !after.has(value)).map(value => `-${value}`);
    return `${label}: ${[...added, ...removed].join(" ")}`;
  }
  if (change.field === "isFree") {
    return change.after === "true" ? "Now free to play" : "No longer free to play";
  }
  return `${label}: ${change.before || "none"} -> ${change.after || "none"}`;
}

/**
 * Summarise a change list for an event title.
 *
 * @param changes - Output of {@link diffSnapshots}.
 * @param limit - Maximum number of changes named in the label.
 * @returns Labels joined with `; `, suffixed with `(+N more)` when truncated.
 */
export function summarizeChanges(changes: readonly FieldChange[], limit: number = SUMMARY_LIMIT): string {
  const ranked = [...changes].sort((a, b) => FIELD_ORDER.indexOf(a.field) - FIELD_ORDER.indexOf(b.field));
  const shown = ranked.slice(0, Math.max(0, limit)).map(describeChange);
  const hidden = ranked.length - shown.length;
  const label = shown.join("; ");
  return hidden > 0 ? `${label} (+${hidden} more)` : label;
}

// CHANGE: Rolling traversal of the identifier space through a persisted cursor.
// WHY: Each run covers one bounded window and the next run resumes where the last one stopped.

import { toErrorMessage } from "./errors.js";
import { debug, warn } from "./logger.js";
import { AppId, ListingSource, SeenEntry } from "./types.js";
import { RandomSource, sampleWithoutReplacement } from "./utils/sampling.js";

export interface OrderingRefresh {
  readonly ordering: AppId[];
  readonly refreshed: boolean;
}

export interface BatchWindow {
  readonly indices: number[];
  readonly ids: AppId[];
}

/**
 * De-duplicate and sort identifiers ascending so the cursor keeps its meaning between runs.
 */
export function normalizeOrdering(ids: readonly AppId[]): AppId[] {
  return [...new Set(ids.filter(id => Number.isSafeInteger(id) && id > 0))].sort((a, b) => a - b);
}

/**
 * Fetch the current identifier ordering, falling back to the cached copy when the listing fails.
 *
 * An empty listing is treated as unavailable.
 */
export async function refreshOrdering(listing: ListingSource, cached: readonly AppId[]): Promise<OrderingRefresh> {
  try {
    const ordering = normalizeOrdering(await listing.listAllIdentifiers());
    if (ordering.length === 0) {
      warn(`Listing returned no identifiers; keeping cached ordering of ${cached.length}`);
      return { ordering: [...cached], refreshed: false };
    }
    debug(`Refreshed ordering: ${ordering.length} identifiers (cached ${cached.length})`);
    return { ordering, refreshed: true };
  } catch (error) {
    warn(`${toErrorMessage(error)}; keeping cached ordering of ${cached.length}`);
    return { ordering: [...cached], refreshed: false };
  }
}

/**
 * Clamp a persisted cursor onto the current ordering.
 *
 * @returns The cursor when it lies in `[0, length)`, otherwise 0.
 */
export function normalizeCursor(cursor: number, length: number): number {
  if (!Number.isInteger(cursor) || cursor < 0 || cursor >= length) {
    return 0;
  }
  return cursor;
}

/**
 * One contiguous window of the ordering starting at the cursor, wrapping to the front.
 *
 * With 10 identifiers, cursor 8 and batch 5 the indices are `[8, 9, 0, 1, 2]`.
 * The window never repeats an index, so it holds at most `ordering.length` entries.
 */
export function computeWindow(ordering: readonly AppId[], cursor: number, batchSize: number): BatchWindow {
  const length = ordering.length;
  const start = normalizeCursor(cursor, length);
  const size = Math.max(0, Math.min(batchSize, length));
  const indices: number[] = [];
  for (let offset = 0; offset < size; offset += 1) {
    indices.push((start + offset) % length);
  }
  return { indices, ids: indices.map(index => ordering[index]) };
}

/**
 * Move the cursor past the identifiers actually attempted this run.
 */
export function advanceCursor(cursor: number, attempted: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return (normalizeCursor(cursor, length) + Math.max(0, attempted)) % length;
}

/**
 * Identifiers that appeared in the ordering without ever being looked at.
 *
 * @param cap - Per-run maximum; larger sets are sampled uniformly at random.
 */
export function selectNewArrivals(
  ordering: readonly AppId[],
  seen: ReadonlyMap<AppId, SeenEntry>,
  cap: number,
  random: RandomSource = Math.random
): AppId[] {
  const arrivals = ordering.filter(id => !seen.has(id));
  if (arrivals.length > cap) {
    debug(`Sampling ${cap} of ${arrivals.length} new arrivals`);
  }
  return sampleWithoutReplacement(arrivals, cap, random);
}

// CHANGE: One bounded crawl run: new arrivals, pending retries, then the rolling window.
// WHY: State is loaded once and saved once, even when the run fails part-way.

import { CRAWL, LOCALES } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { buildChangeEvent, buildNewEvent } from "./events.js";
import { Clock, FetchContext, PacingOptions, defaultPacing, fetchItem, systemClock } from "./fetcher.js";
import { debug, error as logError, info } from "./logger.js";
import { diffSnapshots, extractSnapshot } from "./snapshot.js";
import { advanceCursor, computeWindow, normalizeCursor, refreshOrdering, selectNewArrivals } from "./scanner.js";
import { CrawlState, StateStore } from "./state.js";
import { AppId, DetailSource, ListingSource, RunStats, StoreLocale } from "./types.js";
import { RandomSource } from "./utils/sampling.js";

export interface CrawlOptions {
  readonly batchSize: number;
  readonly newArrivalsCap: number;
  readonly pendingCap: number;
  /** Wall-clock budget in milliseconds; 0 disables the deadline. */
  readonly deadlineMs: number;
  readonly locales: readonly StoreLocale[];
}

export const defaultCrawlOptions: CrawlOptions = {
  batchSize: CRAWL.BATCH_SIZE,
  newArrivalsCap: CRAWL.NEW_ARRIVALS_CAP,
  pendingCap: CRAWL.PENDING_CAP,
  deadlineMs: CRAWL.DEADLINE_SECONDS * 1000,
  locales: [LOCALES.PRIMARY, ...LOCALES.FALLBACKS]
};

export interface CrawlDependencies {
  readonly listing: ListingSource;
  readonly details: DetailSource;
  readonly context: FetchContext;
  readonly options?: Partial<CrawlOptions>;
}

type ItemOutcome = "discovered" | "changed" | "unchanged" | "missing" | "failed";

function timestampOf(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}

/**
 * Resolve one identifier and fold the result into state.
 *
 * Errors are logged and reported as `failed` so the batch continues.
 */
async function processItem(
  id: AppId,
  state: CrawlState,
  details: DetailSource,
  context: FetchContext,
  locales: readonly StoreLocale[]
): Promise<ItemOutcome> {
  try {
    const result = await fetchItem(id, details, context, locales);
    const entry = state.seen.get(id);
    if (result.kind === "not_found") {
      if (!entry) {
        state.seen.set(id, { everDetected: false });
      }
      if (!entry?.everDetected) {
        state.pending.add(id);
      }
      return "missing";
    }

    const timestamp = timestampOf(context.clock);
    const snapshot = extractSnapshot(result.record);
    state.pending.remove(id);

    if (!entry?.everDetected) {
      state.seen.set(id, { everDetected: true, detectedAt: timestamp });
      state.snapshots.set(id, snapshot);
      return state.events.recordNew(buildNewEvent(result.record, timestamp)) ? "discovered" : "unchanged";
    }

    const previous = state.snapshots.get(id);
    state.snapshots.set(id, snapshot);
    if (!previous) {
      return "unchanged";
    }
    const changes = diffSnapshots(previous, snapshot);
    if (changes.length === 0) {
      return "unchanged";
    }
    state.events.recordChange(buildChangeEvent(result.record, changes, timestamp));
    debug(`Detected ${changes.length} changed field(s) for ${id}`);
    return "changed";
  } catch (error) {
    logError(`Failed to process ${id}: ${toErrorMessage(error)}`);
    return "failed";
  }
}

/**
 * Run one crawl pass against an already loaded state, mutating it in place.
 *
 * Each identifier is processed at most once per run. The cursor moves past every rolling identifier
 * attempted, including ones already handled as a new arrival or pending retry.
 */
export async function crawlOnce(state: CrawlState, deps: CrawlDependencies): Promise<RunStats> {
  const options: CrawlOptions = { ...defaultCrawlOptions, ...deps.options };
  const { context } = deps;
  const startedAt = context.clock.now();
  const deadlineAt = options.deadlineMs > 0 ? startedAt + options.deadlineMs : Number.POSITIVE_INFINITY;
  const expired = (): boolean => context.clock.now() >= deadlineAt;

  await context.acquireSlot();
  const { ordering, refreshed } = await refreshOrdering(deps.listing, state.ordering);
  state.ordering = ordering;
  state.cursor = normalizeCursor(state.cursor, ordering.length);

  const arrivals = selectNewArrivals(ordering, state.seen, options.newArrivalsCap, context.random);
  const retries = state.pending.sample(options.pendingCap, context.random);
  const window = computeWindow(ordering, state.cursor, options.batchSize);
  info(
    `Run plan: ${arrivals.length} new arrivals, ${retries.length} pending retries, ${window.ids.length} rolling from cursor ${state.cursor}/${ordering.length}`
  );

  const visited = new Set<AppId>();
  const counters = { attempted: 0, discovered: 0, changed: 0 };
  let stoppedByDeadline = false;

  const visit = async (id: AppId): Promise<void> => {
    visited.add(id);
    counters.attempted += 1;
    const outcome = await processItem(id, state, deps.details, context, options.locales);
    if (outcome === "discovered") {
      counters.discovered += 1;
    } else if (outcome === "changed") {
      counters.changed += 1;
    }
  };

  for (const id of [...arrivals, ...retries]) {
    if (visited.has(id)) {
      continue;
    }
    if (expired()) {
      stoppedByDeadline = true;
      break;
    }
    await visit(id);
  }

  const startCursor = state.cursor;
  let rollingAttempted = 0;
  for (const id of window.ids) {
    if (stoppedByDeadline || expired()) {
      stoppedByDeadline = true;
      break;
    }
    rollingAttempted += 1;
    if (!visited.has(id)) {
      await visit(id);
    }
    state.cursor = advanceCursor(startCursor, rollingAttempted, ordering.length);
  }

  if (stoppedByDeadline) {
    info(`Deadline reached after ${counters.attempted} identifiers; remaining work deferred to the next run.`);
  }

  const stats: RunStats = {
    finishedAt: timestampOf(context.clock),
    orderingSize: ordering.length,
    attempted: counters.attempted,
    discovered: counters.discovered,
    changed: counters.changed,
    pending: state.pending.size,
    stoppedByDeadline,
    listingRefreshed: refreshed
  };
  state.lastRun = stats;
  info(
    `Run complete: attempted ${stats.attempted}, new ${stats.discovered}, changed ${stats.changed}, pending ${stats.pending}, cursor ${state.cursor}.`
  );
  return stats;
}

export interface RunCrawlOptions {
  readonly store: StateStore;
  readonly listing: ListingSource;
  readonly details: DetailSource;
  readonly options?: Partial<CrawlOptions>;
  readonly pacing?: PacingOptions;
  readonly clock?: Clock;
  readonly random?: RandomSource;
}

export interface CrawlResult {
  readonly state: CrawlState;
  readonly stats: RunStats;
}

/**
 * Load state, run one crawl pass and save state, on success and on failure alike.
 *
 * @throws StateCorruptError when the stored state cannot be read; nothing is saved in that case.
 */
export async function runCrawl(params: RunCrawlOptions): Promise<CrawlResult> {
  const clock = params.clock ?? systemClock;
  const state = await params.store.load();
  const context = new FetchContext(params.pacing ?? defaultPacing, clock, params.random ?? Math.random);
  let stats: RunStats;
  try {
    stats = await crawlOnce(state, {
      listing: params.listing,
      details: params.details,
      context,
      options: params.options
    });
  } catch (error) {
    await saveAfterFailure(params.store, state, clock);
    throw error;
  }
  await params.store.save(state, new Date(clock.now()));
  return { state, stats };
}

/**
 * Persist partial progress of a failed run. A save failure is logged so the run's own error is the one reported.
 */
async function saveAfterFailure(store: StateStore, state: CrawlState, clock: Clock): Promise<void> {
  try {
    await store.save(state, new Date(clock.now()));
  } catch (saveError) {
    logError(`Failed to save state after run failure: ${toErrorMessage(saveError)}`);
  }
}

// CHANGE: Resolve identifiers against the detail source with pacing, backoff and locale fallback.
// WHY: Request spacing and slow mode are shared by every fetch of a run, not tracked per identifier.

import { LOCALES, NET } from "./config.js";
import { toErrorMessage } from "./errors.js";
import { debug, warn } from "./logger.js";
import { AppId, DetailOutcome, DetailSource, ItemRecord, StoreLocale } from "./types.js";
import { backoffDelay, sleep } from "./utils/http.js";
import { RandomSource } from "./utils/sampling.js";

export interface Clock {
  now(): number;
  sleep(delayMs: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep
};

export interface PacingOptions {
  readonly minSpacingMs: number;
  readonly slowSpacingMs: number;
  readonly slowModeCooldownMs: number;
  readonly retries: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
}

export const defaultPacing: PacingOptions = {
  minSpacingMs: NET.MIN_SPACING_MS,
  slowSpacingMs: NET.SLOW_SPACING_MS,
  slowModeCooldownMs: NET.SLOW_COOLDOWN_MS,
  retries: NET.RETRIES,
  retryBaseMs: NET.RETRY_BASE_MS,
  retryMaxMs: NET.RETRY_MAX_MS
};

export type FetchResult =
  | { readonly kind: "found"; readonly record: ItemRecord }
  | { readonly kind: "not_found"; readonly exhausted: boolean };

/**
 * Pacing state shared by every outbound request of one run.
 *
 * Invariant: two requests are never issued closer than the active spacing, whatever their outcome.
 */
export class FetchContext {
  private lastRequestAt: number | undefined;
  private slowModeUntil = 0;
  private requestCount = 0;

  constructor(
    readonly pacing: PacingOptions = defaultPacing,
    readonly clock: Clock = systemClock,
    readonly random: RandomSource = Math.random
  ) {}

  isSlowMode(): boolean {
    return this.clock.now() < this.slowModeUntil;
  }

  currentSpacingMs(): number {
    return this.isSlowMode() ? Math.max(this.pacing.slowSpacingMs, this.pacing.minSpacingMs) : this.pacing.minSpacingMs;
  }

  /**
   * Enter (or extend) slow mode for the configured cool-down window.
   */
  enterSlowMode(): void {
    if (!this.isSlowMode()) {
      warn(`Rate limited; slowing request spacing to ${this.pacing.slowSpacingMs}ms for ${this.pacing.slowModeCooldownMs}ms`);
    }
    this.slowModeUntil = this.clock.now() + this.pacing.slowModeCooldownMs;
  }

  /**
   * Wait until the next request may be issued, then record it as issued.
   */
  async acquireSlot(): Promise<void> {
    if (this.lastRequestAt !== undefined) {
      const waitMs = this.lastRequestAt + this.currentSpacingMs() - this.clock.now();
      if (waitMs > 0) {
        await this.clock.sleep(waitMs);
      }
    }
    this.lastRequestAt = this.clock.now();
    this.requestCount += 1;
  }

  requestsIssued(): number {
    return this.requestCount;
  }
}

async function requestOnce(source: DetailSource, id: AppId, locale: StoreLocale, context: FetchContext): Promise<DetailOutcome> {
  await context.acquireSlot();
  try {
    return await source.fetchDetails(id, locale);
  } catch (error) {
    return { kind: "transient", reason: toErrorMessage(error) };
  }
}

/**
 * Resolve one identifier, trying the primary locale then each fallback in order.
 *
 * Rate-limited and transient outcomes are retried with exponential backoff; exhausting the retries
 * ends the call as `not_found` with `exhausted: true` (the pending queue retries on a later run).
 */
export async function fetchItem(
  id: AppId,
  source: DetailSource,
  context: FetchContext,
  locales: readonly StoreLocale[] = [LOCALES.PRIMARY, ...LOCALES.FALLBACKS]
): Promise<FetchResult> {
  const { retries, retryBaseMs, retryMaxMs } = context.pacing;
  for (const locale of locales) {
    let attempt = 0;
    while (true) {
      const outcome = await requestOnce(source, id, locale, context);
      if (outcome.kind === "found") {
        debug(`Resolved ${id} via ${locale.language}/${locale.countryCode}`);
        return { kind: "found", record: outcome.record };
      }
      if (outcome.kind === "not_found") {
        debug(`No record for ${id} in ${locale.language}/${locale.countryCode}`);
        break;
      }
      if (outcome.kind === "rate_limited") {
        context.enterSlowMode();
      }
      if (attempt >= retries) {
        warn(`Giving up on ${id} after ${attempt + 1} attempts (${outcome.kind})`);
        return { kind: "not_found", exhausted: true };
      }
      const computed = backoffDelay(attempt, retryBaseMs, retryMaxMs, context.random());
      const delayMs =
        outcome.kind === "rate_limited" && outcome.retryAfterMs !== undefined
          ? Math.min(retryMaxMs, outcome.retryAfterMs)
          : computed;
      const detail = outcome.kind === "transient" ? outcome.reason : "rate limited";
      debug(`Retrying ${id} (${attempt + 1}/${retries}) in ${delayMs}ms: ${detail}`);
      await context.clock.sleep(delayMs);
      attempt += 1;
    }
  }
  return { kind: "not_found", exhausted: false };
}

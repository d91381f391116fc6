// CHANGE: Pending queue of identifiers listed but not yet resolved.
// WHY: Unresolved identifiers are retried on later runs until they publish.

import { AppId } from "./types.js";
import { RandomSource, sampleWithoutReplacement } from "./utils/sampling.js";

/**
 * Identifiers known to exist in the listing that have not resolved to a published item yet.
 *
 * Insertion-ordered; each run retries a random sample so one stuck identifier cannot starve the rest.
 * Entries leave the queue only by resolving.
 */
export class PendingQueue {
  private readonly ids: Set<AppId>;

  constructor(initial: Iterable<AppId> = []) {
    this.ids = new Set(initial);
  }

  add(id: AppId): void {
    this.ids.add(id);
  }

  remove(id: AppId): boolean {
    return this.ids.delete(id);
  }

  has(id: AppId): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  /**
   * Pick this run's retries.
   *
   * @param cap - Maximum number of identifiers to retry.
   * @returns Every identifier in queue order when the queue fits the cap, otherwise a uniform sample.
   */
  sample(cap: number, random: RandomSource = Math.random): AppId[] {
    return sampleWithoutReplacement(this.toArray(), cap, random);
  }

  toArray(): AppId[] {
    return [...this.ids];
  }
}

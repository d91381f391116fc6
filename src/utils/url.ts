// CHANGE: URL helpers for store links and image normalisation.
// WHY: Image URLs carry cache-busting query parameters that change without the image changing.

import { SOURCES } from "../config.js";
import { AppId } from "../types.js";

const VOLATILE_QUERY_PARAMS = ["t", "v", "ts", "timestamp"] as const;

/**
 * Remove cache-busting query parameters from an image URL.
 *
 * @param rawUrl - URL as reported by the store.
 * @returns URL without volatile parameters; unparseable input is returned trimmed.
 */
export function stripVolatileQuery(rawUrl: string): string {
  const trimmed = rawUrl.trim();
  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return trimmed;
  }
  for (const param of VOLATILE_QUERY_PARAMS) {
    parsed.searchParams.delete(param);
  }
  return parsed.toString();
}

/**
 * Public store page for an identifier.
 */
export function storeLink(id: AppId, base: string = SOURCES.STORE_APP): string {
  return `${base.replace(/\/+$/, "")}/${id}/`;
}

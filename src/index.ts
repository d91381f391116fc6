#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Allows importing the library surface without triggering command parsing.

import fs from "fs-extra";
import { pathToFileURL } from "url";
import { runCli } from "./cli.js";
import { toErrorMessage } from "./errors.js";
import { debug } from "./logger.js";

/**
 * True when `scriptPath` is the module at `moduleUrl`, following symlinks such as npm's bin links.
 */
export function isDirectExecution(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  let resolved = scriptPath;
  try {
    resolved = fs.realpathSync(scriptPath);
  } catch (error) {
    debug(`Cannot resolve ${scriptPath}: ${toErrorMessage(error)}`);
  }
  return pathToFileURL(resolved).href === moduleUrl;
}

if (isDirectExecution(process.argv[1], import.meta.url)) {
  void runCli(process.argv);
}

export { runCli };
export { StoreApi } from "./api.js";
export { runCrawl, crawlOnce } from "./crawler.js";
export type { CrawlOptions, CrawlResult } from "./crawler.js";
export { renderFeed, writeFeeds } from "./feed.js";
export { StateStore } from "./state.js";
export { StateCorruptError, ListingUnavailableError } from "./errors.js";

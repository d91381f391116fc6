// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: Commands can be inspected and invoked without parsing process arguments.

import { Command, InvalidArgumentError } from "commander";
import { StoreApi } from "./api.js";
import { FEED, STATE } from "./config.js";
import { CrawlOptions, runCrawl } from "./crawler.js";
import { toErrorMessage } from "./errors.js";
import { FeedPaths, writeFeeds } from "./feed.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { StateStore } from "./state.js";
import { seededRandom } from "./utils/sampling.js";

export interface RunCommandOptions {
  readonly state: string;
  readonly batch?: number;
  readonly newCap?: number;
  readonly pendingCap?: number;
  readonly deadline?: number;
  readonly seed?: number;
  readonly feeds: boolean;
  readonly feedNew: string;
  readonly feedChanges: string;
}

export interface FeedCommandOptions {
  readonly state: string;
  readonly feedNew: string;
  readonly feedChanges: string;
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, received "${value}".`);
  }
  return parsed;
}

/**
 * Keep only the overrides given on the command line so configured defaults still apply.
 */
export function toCrawlOverrides(options: RunCommandOptions): Partial<CrawlOptions> {
  return {
    ...(options.batch !== undefined ? { batchSize: options.batch } : {}),
    ...(options.newCap !== undefined ? { newArrivalsCap: options.newCap } : {}),
    ...(options.pendingCap !== undefined ? { pendingCap: options.pendingCap } : {}),
    ...(options.deadline !== undefined ? { deadlineMs: options.deadline * 1000 } : {})
  };
}

function feedPaths(options: { readonly feedNew: string; readonly feedChanges: string }): FeedPaths {
  return { newPath: options.feedNew, changesPath: options.feedChanges };
}

/**
 * Crawl entry point: one bounded run against the store, then feed rendering.
 */
export async function runAction(options: RunCommandOptions): Promise<void> {
  const api = new StoreApi();
  const { state } = await runCrawl({
    store: new StateStore(options.state),
    listing: api,
    details: api,
    options: toCrawlOverrides(options),
    random: options.seed !== undefined ? seededRandom(options.seed) : undefined
  });
  if (options.feeds) {
    await writeFeeds(state.events, feedPaths(options));
    info(`Feeds written to ${options.feedNew} and ${options.feedChanges}.`);
  }
}

/**
 * State mode entry point: print state statistics.
 */
export async function stateAction(options: { readonly state: string }): Promise<void> {
  const store = new StateStore(options.state);
  console.log(await store.stats());
}

/**
 * Reset mode entry point: remove the state file.
 */
export async function resetAction(options: { readonly state: string }): Promise<void> {
  await new StateStore(options.state).clear();
  info(`State ${options.state} cleared.`);
}

/**
 * Feed mode entry point: re-render feeds from stored events without crawling.
 */
export async function feedAction(options: FeedCommandOptions): Promise<void> {
  const state = await new StateStore(options.state).load();
  await writeFeeds(state.events, feedPaths(options));
  info(`Feeds written to ${options.feedNew} and ${options.feedChanges}.`);
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program
    .name("catalog-watch")
    .description("Rolling store catalog crawler with change feeds")
    .version("1.0.0")
    .option("--log-level <level>", "debug, info, warn or error")
    .hook("preAction", command => {
      const level: unknown = command.opts().logLevel;
      if (typeof level === "string") {
        setLogLevel(level);
      }
    });

  const crawlCommand = program.command("crawl").description("Crawl operations");
  crawlCommand
    .command("run")
    .description("Run one bounded crawl pass and refresh the feeds")
    .option("--state <path>", "state file (.gz for compressed)", STATE.PATH)
    .option("--batch <count>", "rolling window size", parseCount)
    .option("--new-cap <count>", "maximum new arrivals per run", parseCount)
    .option("--pending-cap <count>", "maximum pending retries per run", parseCount)
    .option("--deadline <seconds>", "wall-clock budget, 0 for none", parseCount)
    .option("--seed <number>", "seed for reproducible sampling", parseCount)
    .option("--no-feeds", "skip feed rendering")
    .option("--feed-new <path>", "new items feed path", FEED.NEW_PATH)
    .option("--feed-changes <path>", "changes feed path", FEED.CHANGES_PATH)
    .action(async (options: RunCommandOptions) => runAction(options));
  crawlCommand
    .command("state")
    .description("Display state statistics")
    .option("--state <path>", "state file", STATE.PATH)
    .action(async (options: { state: string }) => stateAction(options));
  crawlCommand
    .command("reset")
    .description("Delete the state file")
    .option("--state <path>", "state file", STATE.PATH)
    .action(async (options: { state: string }) => resetAction(options));
  crawlCommand
    .command("feed")
    .description("Render feeds from stored events")
    .option("--state <path>", "state file", STATE.PATH)
    .option("--feed-new <path>", "new items feed path", FEED.NEW_PATH)
    .option("--feed-changes <path>", "changes feed path", FEED.CHANGES_PATH)
    .action(async (options: FeedCommandOptions) => feedAction(options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str.trim())
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  }
}

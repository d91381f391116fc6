// CHANGE: Render the two event streams as RSS 2.0 documents.
// WHY: Feed readers are the consumers of discoveries and changes.

import fs from "fs-extra";
import { XMLBuilder } from "fast-xml-parser";
import { FEED, SOURCES } from "./config.js";
import { EventStore } from "./events.js";
import { describeChange } from "./snapshot.js";
import { CrawlEvent } from "./types.js";

export interface FeedChannel {
  readonly title: string;
  readonly link: string;
  readonly description: string;
}

export interface FeedPaths {
  readonly newPath: string;
  readonly changesPath: string;
}

export const NEW_CHANNEL: FeedChannel = {
  title: "New store pages",
  link: SOURCES.STORE_APP,
  description: "Store pages seen for the first time"
};

export const CHANGES_CHANNEL: FeedChannel = {
  title: "Store page changes",
  link: SOURCES.STORE_APP,
  description: "Price, language, description and media changes on known store pages"
};

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  suppressEmptyNode: true
});

/**
 * Plain-text item body: summary first, then whatever the payload carries.
 */
export function describeEvent(event: CrawlEvent): string {
  const { payload } = event;
  const lines = [event.summary];
  if (payload.priceText) {
    lines.push(`Price: ${payload.priceText}`);
  }
  if (payload.releaseText) {
    lines.push(payload.releaseText);
  }
  for (const change of payload.changes ?? []) {
    lines.push(describeChange(change));
  }
  if (payload.description) {
    lines.push(payload.description);
  }
  return lines.join("\n");
}

function toItem(event: CrawlEvent) {
  return {
    title: event.title,
    link: event.link,
    guid: { "#text": event.key, "@_isPermaLink": "false" },
    pubDate: new Date(event.timestamp).toUTCString(),
    description: describeEvent(event),
    ...(event.image ? { enclosure: { "@_url": event.image, "@_type": "image/jpeg", "@_length": "0" } } : {})
  };
}

/**
 * Render one channel; items keep the order given (most recent first).
 */
export function renderFeed(events: readonly CrawlEvent[], channel: FeedChannel, now: Date = new Date()): string {
  const document = {
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    rss: {
      "@_version": "2.0",
      channel: {
        title: channel.title,
        link: channel.link,
        description: channel.description,
        lastBuildDate: now.toUTCString(),
        ...(events.length > 0 ? { item: events.map(toItem) } : {})
      }
    }
  };
  return builder.build(document);
}

/**
 * Write both feeds.
 */
export async function writeFeeds(
  events: EventStore,
  paths: FeedPaths = { newPath: FEED.NEW_PATH, changesPath: FEED.CHANGES_PATH },
  now: Date = new Date()
): Promise<void> {
  await fs.outputFile(paths.newPath, renderFeed(events.listNew(), NEW_CHANNEL, now));
  await fs.outputFile(paths.changesPath, renderFeed(events.listChanges(), CHANGES_CHANNEL, now));
}

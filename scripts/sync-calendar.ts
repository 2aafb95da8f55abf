#!/usr/bin/env node
/**
 * Calendar Sync CLI
 *
 * Pushes local-only events (local_ ids) to Google Calendar and moves
 * them onto the calendar-issued ids. Safe to run repeatedly.
 *
 * Usage:
 *   npm run sync                 # Backfill local-only events
 *   npm run sync -- --reset      # Forget a cached connection failure first
 *   npm run sync -- --verbose    # Show each event's outcome
 */

import { createAssistant } from "../lib/assistant.js";
import { loadConfig } from "../lib/config.js";

function printHelp(): void {
  console.log(`
Calendar Sync CLI

Pushes events that were stored locally while Google Calendar was
unreachable, and replaces their local_ ids with the calendar ids.

Usage:
  npm run sync -- [options]

Options:
  --reset                 Reset the calendar connection before syncing
  --verbose, -v           Show each event's outcome
  --help, -h              Show this help message

Configuration:
  config/assistant.json               timezone, timeouts, database
  config/credentials-<account>.json   Google OAuth client
  config/tokens-<account>.json        created by "npm run auth"
  `);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let reset = false;
  let verbose = false;

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }
    if (arg === "--reset") {
      reset = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      verbose = true;
      continue;
    }

    console.error(`Error: Unknown argument: ${arg}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
  }

  const config = loadConfig();
  const assistant = await createAssistant(config, {
    log: verbose ? (message) => console.log(message) : undefined,
  });

  try {
    if (reset) {
      assistant.engine.resetConnection();
    }

    const startTime = Date.now();
    const result = await assistant.engine.backfillSync();

    if (verbose) {
      for (const item of result.results) {
        const suffix = item.old_event_id ? ` (was ${item.old_event_id})` : item.error ? `: ${item.error}` : "";
        console.log(`  ${item.status.padEnd(20)} ${item.event_id}  ${item.event}${suffix}`);
      }
    }

    console.log("\n=== Sync Summary ===");
    console.log(`Status:        ${result.status}`);
    console.log(`Total events:  ${result.total_events}`);
    console.log(`  Synced now:  +${result.synced_count}`);
    console.log(`  Failed:      !${result.failed_count}`);
    console.log(`Duration: ${((Date.now() - startTime) / 1000).toFixed(1)}s`);

    if (result.synced_count === 0 && result.failed_count === 0) {
      console.log("All events are already in Google Calendar.");
    }
    if (result.status === "calendar_unavailable") {
      process.exitCode = 2;
    }
  } catch (error) {
    console.error("Sync failed:", error);
    process.exitCode = 1;
  } finally {
    assistant.close();
  }
}

main().catch((error) => {
  console.error("Sync failed:", error);
  process.exit(1);
});

#!/usr/bin/env node
/**
 * Google Calendar authorization
 *
 * Usage:
 *   npm run auth [account-name]
 *   npm run auth -- --list
 */

import { loadConfig } from "../lib/config.js";
import { authorizeAccount, listAvailableAccounts } from "../lib/google-auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const arg = process.argv[2];

  if (arg === "--list") {
    const accounts = listAvailableAccounts(config.configDir);
    console.log("Available accounts:");
    accounts.forEach((a) => console.log(`  - ${a}`));
    if (accounts.length === 0) {
      console.log("  (none found - add credentials-<name>.json to config/)");
    }
    return;
  }

  const account = arg || config.googleAccount;
  console.log(`Starting Google Calendar authentication for account: ${account}\n`);

  await authorizeAccount({
    configDir: config.configDir,
    account,
    log: (message) => console.log(message),
  });
  console.log("\nAuthentication successful!");
  console.log("Events created from now on will be mirrored into Google Calendar.");
  console.log('Run "npm run sync -- --reset" to push events stored while the calendar was unavailable.');
}

main().catch((err) => {
  console.error("Authentication failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});

/**
 * Deletes closed chats older than N days, with their messages and files.
 *
 *   npm run cleanup-old-chats -- --days 14 --dry-run
 */
/* eslint-disable no-console */
import { parseArgs } from "util";
import { disconnectDb } from "../config/db";
import { buildServices } from "../container";

const PREVIEW_LIMIT = 10;

async function main() {
  const { values } = parseArgs({
    options: {
      days: { type: "string", default: "7" },
      "dry-run": { type: "boolean", default: false },
    },
  });
  const days = Number(values.days);
  if (!Number.isInteger(days) || days < 0) throw new Error(`--days must be a non-negative integer, got "${values.days}"`);
  const dryRun = values["dry-run"] ?? false;

  const { chats } = await buildServices();
  try {
    const result = await chats.deleteClosedChatsOlderThan(days, { dryRun });
    if (result.count === 0) {
      console.log(`No closed chats older than ${days} day(s).`);
    } else if (result.dryRun) {
      console.log(`Would delete ${result.count} closed chat(s) older than ${days} day(s):`);
      for (const chatId of result.chatIds.slice(0, PREVIEW_LIMIT)) console.log(`  - ${chatId}`);
      if (result.count > PREVIEW_LIMIT) console.log(`  ... and ${result.count - PREVIEW_LIMIT} more`);
    } else {
      console.log(`Deleted ${result.count} closed chat(s) older than ${days} day(s).`);
    }
  } finally {
    await disconnectDb();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

/**
 * Writes the default weekly schedule (Mon-Fri open, weekend closed).
 * Does nothing if any day is already configured, unless --force is given.
 *
 *   npm run init-schedule -- [--force] [--extended-hours | --finals-week]
 */
/* eslint-disable no-console */
import { parseArgs } from "util";
import { disconnectDb } from "../config/db";
import { buildServices } from "../container";
import { presentScheduleEntry } from "../routes/presenters";

async function main() {
  const { values } = parseArgs({
    options: {
      force: { type: "boolean", default: false },
      "extended-hours": { type: "boolean", default: false },
      "finals-week": { type: "boolean", default: false },
    },
  });
  if (values["extended-hours"] && values["finals-week"]) {
    throw new Error("Pick one of --extended-hours and --finals-week");
  }
  const preset = values["finals-week"] ? "finals_week" : values["extended-hours"] ? "extended_hours" : "business_hours";

  const { schedule, clock } = await buildServices();
  try {
    const { created, updated, existing } = await schedule.initializeSchedule(preset, { force: values.force ?? false });
    if (created + updated === 0) {
      console.warn(`Schedule already exists (${existing} days configured). Use --force to reinitialize.`);
      return;
    }
    console.log(`Schedule initialized with ${preset}: ${created} created, ${updated} updated.`);

    for (const entry of await schedule.getWeeklySchedule()) console.log(`  ${presentScheduleEntry(entry).display}`);

    const status = await schedule.getStatus(clock());
    console.log(`\nCurrently ${status.available ? "available" : "unavailable"}: ${status.reason}`);
    if (!status.available) console.log(`Next available: ${status.nextAvailable}`);
  } finally {
    await disconnectDb();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

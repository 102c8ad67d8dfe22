/**
 * Production entry point (any Node host).
 */
import http from "http";
import { env } from "./config/env";
import { createApp } from "./app";
import { buildServices } from "./container";

async function main() {
  const services = await buildServices();
  await services.schedule.seedDefaults();

  const app = createApp(services);
  const server = http.createServer(app);

  server.listen(env.PORT, () => {
    // eslint-disable-next-line no-console
    console.log(`Helpdesk chat backend listening on http://localhost:${env.PORT} (${env.SUPPORT_TIME_ZONE})`);
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});

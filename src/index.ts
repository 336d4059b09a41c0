// src/index.ts
import { createApp } from "./app";
import { db, pool } from "./db/drizzle";
import { ENV } from "./env";
import { logger } from "./logger";
import { createServices } from "./services";
import { createDrizzleStore } from "./store/drizzle";

const app = createApp(createServices({ store: createDrizzleStore(db) }));

const server = app.listen(ENV.PORT, () => {
  logger.info({ port: ENV.PORT }, `fleetdesk api on http://localhost:${ENV.PORT}`);
});

process.on("SIGINT", () => {
  server.close();
  pool.end().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, "error closing database pool");
      process.exit(1);
    },
  );
});

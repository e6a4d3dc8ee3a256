/**
 * Front-of-house waitlist server
 *
 * Main entry point: loads configuration, seeds the default tables (idempotent)
 * and starts listening for WhatsApp webhooks.
 */

import { loadConfig } from "./config/env";
import { createLogger } from "./logger";
import { buildApp } from "./app";
import { seedTables } from "./store/seed-data";

const config = loadConfig();
const logger = createLogger(config);
const { app, store } = buildApp({ config, logger });

const inserted = store.seedTables(seedTables);
logger.info({ inserted, tables: store.listTables().length }, "tables seeded");

try {
    await app.listen({ port: config.port, host: config.host });
} catch (error) {
    logger.fatal({ err: error }, "server failed to start");
    process.exit(1);
}

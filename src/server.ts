import { loadConfigFromEnvironment } from "./config.js";
import { createLogger } from "./logger.js";
import { createInMemoryDirectory } from "./http/directory.js";
import { startServer } from "./http/server.js";
import { loadPlacesFromFile } from "./ingest/placeRecords.js";

const config = loadConfigFromEnvironment();
const log = createLogger({ level: config.LOG_LEVEL, env: config.NODE_ENV });

const directory = createInMemoryDirectory();

if (config.DATA_FILE) {
  const { places, failures } = await loadPlacesFromFile(config.DATA_FILE);
  for (const f of failures) log.warn({ file: config.DATA_FILE, line: f.line }, f.message);
  const added = directory.addMany(places);
  log.info({ file: config.DATA_FILE, added, skipped: failures.length }, "places loaded");
}

const { server, port } = await startServer({ port: config.PORT, host: config.HOST, directory, logger: log });

function shutdown(): void {
  log.info("shutting down");
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

log.info({ port }, "listening");

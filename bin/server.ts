import { isIP } from "node:net";
import { serve } from "@hono/node-server";
import { getLogger } from "@logtape/logtape";
import { behindProxy } from "x-forwarded-fetch";
import { config } from "../src/config";
import db, { closeDatabase } from "../src/db";
import app from "../src/index";
import { configureLogging } from "../src/logging";
import { migrate } from "../src/migrate";

await configureLogging({ level: config.LOG_LEVEL, logQuery: config.LOG_QUERY });

const logger = getLogger(["penpost", "server"]);

const { BIND, PORT } = config;

if (BIND && BIND !== "localhost" && !isIP(BIND)) {
  logger.fatal("Invalid BIND: must be an IP address or localhost, if specified");
  process.exit(1);
}

const applied = await migrate(db);
if (applied.length > 0) {
  logger.info("Applied migrations: {applied}", { applied });
}

const server = serve(
  {
    fetch: config.BEHIND_PROXY
      ? behindProxy(app.fetch.bind(app))
      : app.fetch.bind(app),
    port: PORT,
    hostname: BIND,
  },
  (info) => {
    let host = info.address;
    // We override it here to show localhost instead of what it resolves to:
    if (BIND === "localhost") {
      host = "localhost";
    } else if (info.family === "IPv6") {
      host = `[${info.address}]`;
    }

    logger.info("Listening on http://{host}:{port}/", {
      host,
      port: info.port,
    });
  },
);

const shutdown = (signal: NodeJS.Signals) => {
  logger.info("Received {signal}; shutting down", { signal });
  server.close((error) => {
    if (error != null) {
      logger.error("Failed to close the server: {error}", { error });
    }
    void closeDatabase().then(
      () => process.exit(error == null ? 0 : 1),
      (dbError: unknown) => {
        logger.error("Failed to close the database: {error}", {
          error: dbError,
        });
        process.exit(1);
      },
    );
  });
};

process.once("SIGTERM", shutdown);
process.once("SIGINT", shutdown);

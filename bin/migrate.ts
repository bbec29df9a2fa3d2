import { getLogger } from "@logtape/logtape";
import { config } from "../src/config";
import db from "../src/db";
import { configureLogging } from "../src/logging";
import { migrate } from "../src/migrate";

await configureLogging({ level: config.LOG_LEVEL, logQuery: config.LOG_QUERY });

const logger = getLogger(["penpost", "migrate"]);

const applied = await migrate(db);
logger.info("{count} migration(s) applied", { count: applied.length });
process.exit(0);

import {
  ansiColorFormatter,
  configure,
  getConsoleSink,
  getLogger,
  type LogLevel,
} from "@logtape/logtape";
import { createMiddleware } from "hono/factory";

export interface LoggingOptions {
  level: LogLevel;
  logQuery: boolean;
}

export async function configureLogging({
  level,
  logQuery,
}: LoggingOptions): Promise<void> {
  await configure({
    sinks: {
      console: getConsoleSink({ formatter: ansiColorFormatter }),
    },
    filters: {},
    loggers: [
      { category: "penpost", lowestLevel: level, sinks: ["console"] },
      {
        category: "drizzle-orm",
        lowestLevel: logQuery ? "debug" : "fatal",
        sinks: ["console"],
      },
      {
        category: ["logtape", "meta"],
        lowestLevel: "warning",
        sinks: ["console"],
      },
    ],
  });
}

const httpLogger = getLogger(["penpost", "http"]);

export const requestLogger = createMiddleware(async (c, next) => {
  const start = performance.now();
  await next();
  httpLogger.info("{method} {path} {status} {ms}ms", {
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    ms: Math.round(performance.now() - start),
  });
});

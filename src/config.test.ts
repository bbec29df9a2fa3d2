import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

const required = {
  DATABASE_URL: "memory://",
  SECRET_KEY: "test-secret",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(required)).toEqual({
      DATABASE_URL: "memory://",
      SECRET_KEY: "test-secret",
      LOG_LEVEL: "info",
      LOG_QUERY: false,
      PAGE_SIZE: 10,
      PORT: 3000,
      BIND: undefined,
      BEHIND_PROXY: false,
    });
  });

  it("parses every setting", () => {
    expect(
      loadConfig({
        ...required,
        LOG_LEVEL: "debug",
        LOG_QUERY: "true",
        PAGE_SIZE: "25",
        PORT: "8080",
        BIND: "127.0.0.1",
        BEHIND_PROXY: "true",
      }),
    ).toEqual({
      DATABASE_URL: "memory://",
      SECRET_KEY: "test-secret",
      LOG_LEVEL: "debug",
      LOG_QUERY: true,
      PAGE_SIZE: 25,
      PORT: 8080,
      BIND: "127.0.0.1",
      BEHIND_PROXY: true,
    });
  });

  it("requires a database URL and a secret key", () => {
    expect(() => loadConfig({})).toThrow(
      "Invalid configuration: DATABASE_URL must be defined; SECRET_KEY must be defined",
    );
  });

  it("rejects out-of-range page sizes", () => {
    expect(() => loadConfig({ ...required, PAGE_SIZE: "100" })).toThrow(
      "Invalid configuration: PAGE_SIZE must be between 1 and 50",
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ ...required, LOG_LEVEL: "verbose" })).toThrow(
      "Invalid configuration:",
    );
  });
});

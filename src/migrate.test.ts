import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { describe, expect, it } from "vitest";
import type { Database } from "./db";
import { loadMigrations, migrate, splitStatements } from "./migrate";
import * as schema from "./schema";

function freshDatabase(): Database {
  return drizzle(new PGlite(), { schema });
}

describe("splitStatements", () => {
  it("splits on statement breakpoints and drops empty chunks", () => {
    expect(
      splitStatements(
        "CREATE TABLE a (id int);\n--> statement-breakpoint\n\n--> statement-breakpoint\nCREATE TABLE b (id int);\n",
      ),
    ).toEqual(["CREATE TABLE a (id int);", "CREATE TABLE b (id int);"]);
  });
});

describe("loadMigrations", () => {
  it("loads the bundled migrations in order", async () => {
    expect.assertions(2);

    const migrations = await loadMigrations();
    expect(migrations.map((m) => m.name)).toEqual(["0000_initial.sql"]);
    expect(migrations[0].statements.length).toBeGreaterThan(1);
  });
});

describe("migrate", () => {
  it("applies pending migrations once", async () => {
    expect.assertions(3);

    const db = freshDatabase();
    const migrations = [
      { name: "0001_a.sql", statements: ["CREATE TABLE a (id int)"] },
      {
        name: "0002_b.sql",
        statements: ["CREATE TABLE b (id int)", "INSERT INTO b VALUES (1)"],
      },
    ];

    expect(await migrate(db, migrations)).toEqual(["0001_a.sql", "0002_b.sql"]);
    expect(await migrate(db, migrations)).toEqual([]);
    expect(
      await migrate(db, [
        ...migrations,
        { name: "0003_c.sql", statements: ["CREATE TABLE c (id int)"] },
      ]),
    ).toEqual(["0003_c.sql"]);
  });

  it("rolls back a failing migration", async () => {
    expect.assertions(2);

    const db = freshDatabase();
    await expect(
      migrate(db, [
        {
          name: "0001_broken.sql",
          statements: ["CREATE TABLE a (id int)", "NOT VALID SQL"],
        },
      ]),
    ).rejects.toThrow();
    expect(
      await migrate(db, [
        { name: "0001_broken.sql", statements: ["CREATE TABLE a (id int)"] },
      ]),
    ).toEqual(["0001_broken.sql"]);
  });

  it("creates the application schema", async () => {
    expect.assertions(1);

    const db = freshDatabase();
    await migrate(db);
    expect(await db.select().from(schema.posts)).toEqual([]);
  });
});

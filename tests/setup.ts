import { beforeAll } from "vitest";
import db from "../src/db";
import { migrate } from "../src/migrate";

beforeAll(async () => {
  await migrate(db);
});

import fs from "fs";
import path from "path";
import pool from "../config/db";

const initDb = async () => {
  const schemaPath = path.resolve(process.cwd(), "src/db/schema.sql");
  const schemaSql = fs.readFileSync(schemaPath, "utf8");

  console.log("Running schema migration...");

  const statements = schemaSql
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    for (const statement of statements) {
      await client.query(statement);
    }
    await client.query("COMMIT");
    console.log("✅ Database initialized successfully.");
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
};

initDb()
  .catch((err) => {
    console.error("❌ Migration Failed:", err);
    process.exitCode = 1;
  })
  .finally(() => pool.end());

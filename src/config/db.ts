import { Pool, QueryResultRow } from "pg";
import { config } from "./env";

const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
  // Fallback to individual variables ONLY if DATABASE_URL is not provided
  user: !process.env.DATABASE_URL
    ? process.env.DB_USER || "postgres"
    : undefined,
  host: !process.env.DATABASE_URL
    ? process.env.DB_HOST || "localhost"
    : undefined,
  database: !process.env.DATABASE_URL
    ? process.env.DB_NAME || "marketplace"
    : undefined,
  password: !process.env.DATABASE_URL
    ? process.env.DB_PASSWORD || "password"
    : undefined,
  port: !process.env.DATABASE_URL
    ? parseInt(process.env.DB_PORT || "5432", 10)
    : undefined,
  ssl: config.isProduction ? { rejectUnauthorized: false } : false,
});

pool.on("error", (err) => {
  console.error("Unexpected error on idle client", err);
  process.exit(-1);
});

export const query = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) => pool.query<T>(text, params);

// SQLSTATE unique_violation
const UNIQUE_VIOLATION = "23505";

export const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === UNIQUE_VIOLATION;

export default pool;

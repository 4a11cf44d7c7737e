import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import pg from "pg";

const { Pool } = pg;

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Both src/shared and dist/shared sit two levels below the project root.
export const schemaPath = path.resolve(__dirname, "..", "..", "data", "schema.sql");

let pool: pg.Pool | null = null;

const getSslConfig = (dbUrl: string): pg.PoolConfig["ssl"] | undefined => {
  let sslMode = process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE ?? "";

  try {
    const url = new URL(dbUrl);
    sslMode = sslMode || url.searchParams.get("sslmode") || "";
  } catch {
    // Malformed URLs fall back to the env setting.
  }

  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

export const getPool = (dbUrl: string): pg.Pool => {
  if (!dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  if (!pool) {
    pool = new Pool({
      connectionString: dbUrl,
      ssl: getSslConfig(dbUrl),
      max: 4,
      connectionTimeoutMillis: 10_000
    });
  }
  return pool;
};

export const closePool = async () => {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
};

export const readSchema = () => fs.readFileSync(schemaPath, "utf-8");

import { config } from "./shared/config.js";
import { closePool, getPool, readSchema } from "./shared/db.js";
import { PgRecordStore } from "./shared/store.js";

const run = async () => {
  if (!config.dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  try {
    await new PgRecordStore(getPool(config.dbUrl), readSchema).ensureSchema();
    console.log("Schema applied.");
  } finally {
    await closePool();
  }
};

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});

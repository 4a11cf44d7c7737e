import { config } from "../shared/config.js";
import { getPool, readSchema } from "../shared/db.js";
import { PgRecordStore } from "../shared/store.js";
import { createApp } from "./app.js";

const start = () => {
  if (!config.apiKey) {
    console.error("Missing API_KEY in environment");
    process.exit(1);
  }

  const store = new PgRecordStore(getPool(config.dbUrl), readSchema);
  const app = createApp({ store, apiKey: config.apiKey });
  app.listen(config.port, () => {
    console.log(`Report API listening on http://localhost:${config.port}`);
  });
};

start();

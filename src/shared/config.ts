import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.RANKHARVEST_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const numberEnv = (key: string, fallback: number): number => {
  const parsed = Number(process.env[key]);
  return process.env[key] && Number.isFinite(parsed) ? parsed : fallback;
};

export const config = {
  targetUrl: process.env.TARGET_URL ?? "https://en.wikipedia.org/wiki/List_of_Spotify_streaming_records",
  targetHeading: process.env.TARGET_HEADING ?? "Most-streamed songs",
  userAgent: process.env.USER_AGENT ?? "rankharvest/0.1 (+https://example.local)",
  fetchTimeoutMs: numberEnv("FETCH_TIMEOUT_MS", 30_000),
  scrapeSchedule: process.env.SCRAPE_SCHEDULE ?? "0 15 * * *",
  scrapeTimezone: process.env.SCRAPE_TIMEZONE || undefined,
  logFile: process.env.LOG_FILE ?? "rankharvest.log",
  logMaxBytes: numberEnv("LOG_MAX_BYTES", 5 * 1024 * 1024),
  logBackupCount: numberEnv("LOG_BACKUP_COUNT", 3),
  apiKey: process.env.API_KEY ?? "",
  port: numberEnv("PORT", 3000),
  dbUrl:
    process.env.DATABASE_URL ??
    process.env.POSTGRES_URL ??
    process.env.POSTGRES_URL_NON_POOLING ??
    ""
};

import fs from "fs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { closePool, getPool, readSchema, schemaPath } from "./db.js";

describe("getPool", () => {
  afterEach(async () => {
    await closePool();
    vi.unstubAllEnvs();
  });

  it("requires a connection string", () => {
    expect(() => getPool("")).toThrow("DATABASE_URL is required");
  });

  it("leaves SSL off for pooler hosts unless a mode is set", () => {
    vi.stubEnv("DATABASE_SSLMODE", "");

    const pool = getPool("postgres://app@aws-0.pooler.example.test:6543/rankharvest");

    expect(pool).not.toHaveProperty("options.ssl.rejectUnauthorized");
  });

  it("takes the mode from the sslmode query parameter", () => {
    vi.stubEnv("DATABASE_SSLMODE", "");

    const pool = getPool("postgres://app@db.example.test:5432/rankharvest?sslmode=require");

    expect(pool).toMatchObject({ options: { ssl: { rejectUnauthorized: false } } });
  });

  it("prefers DATABASE_SSLMODE over the URL", () => {
    vi.stubEnv("DATABASE_SSLMODE", "verify-full");

    const pool = getPool("postgres://app@db.example.test:5432/rankharvest?sslmode=disable");

    expect(pool).toMatchObject({ options: { ssl: { rejectUnauthorized: true } } });
  });
});

describe("readSchema", () => {
  it("reads the schema file beside the sources", () => {
    expect(readSchema()).toBe(fs.readFileSync(schemaPath, "utf-8"));
    expect(readSchema()).toContain("UNIQUE (scraping_date, rank, title, author)");
  });
});

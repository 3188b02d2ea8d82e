/**
 * Applies sql/schema.sql. Every statement in it is idempotent, so this runs
 * safely on every `migrate`.
 */

import { readFile } from "fs/promises";
import path from "path";
import { StoreUnavailableError } from "../errors";
import type { Queryable } from "./postgres-store";

export const SCHEMA_PATH = path.join(__dirname, "..", "..", "sql", "schema.sql");

export async function applySchema(
  db: Queryable,
  options: { schemaPath?: string; onProgress?: (message: string) => void } = {}
): Promise<void> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const schemaPath = options.schemaPath ?? SCHEMA_PATH;

  const sql = await readFile(schemaPath, "utf-8");
  onProgress(`Applying schema from ${path.basename(schemaPath)}...`);
  try {
    await db.query(sql);
  } catch (error) {
    throw new StoreUnavailableError("schema migration", error);
  }
  onProgress("Schema is up to date.");
}

import { neon } from "@neondatabase/serverless";
import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import * as schema from "../db/schema.js";

export type Database = NeonHttpDatabase<typeof schema>;

export function createDatabase(databaseUrl: string): Database {
  const sql = neon(databaseUrl);
  return drizzle({ client: sql, schema });
}

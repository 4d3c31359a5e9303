import fs from "node:fs";
import path from "node:path";
import { createClient, type Client } from "@libsql/client";
import { drizzle, type LibSQLDatabase } from "drizzle-orm/libsql";
import * as schema from "./schema";

export const DEFAULT_DATABASE_URL = "file:./.tmp/dev.db";
const SCHEMA_FILE = path.resolve(process.cwd(), "sql/schema.sql");

export type DrizzleClient = LibSQLDatabase<typeof schema>;

export type Database = {
  libsql: Client;
  db: DrizzleClient;
};

export type DatabaseOptions = {
  url?: string;
  authToken?: string;
};

export function createDatabase({ url = DEFAULT_DATABASE_URL, authToken }: DatabaseOptions = {}): Database {
  ensureLocalSQLiteFile(url);
  const libsql = createClient({ url, authToken });
  return { libsql, db: drizzle(libsql, { schema }) };
}

export async function ensureSchema(libsql: Client) {
  const ddl = await fs.promises.readFile(SCHEMA_FILE, "utf8");
  await libsql.executeMultiple(ddl);
}

function ensureLocalSQLiteFile(url: string) {
  if (!url.startsWith("file:")) {
    return;
  }

  const relativePath = url.replace(/^file:/, "");
  const resolvedPath = path.isAbsolute(relativePath)
    ? relativePath
    : path.resolve(process.cwd(), relativePath);

  fs.mkdirSync(path.dirname(resolvedPath), { recursive: true });
  if (!fs.existsSync(resolvedPath)) {
    fs.closeSync(fs.openSync(resolvedPath, "a"));
  }
}

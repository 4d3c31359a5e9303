import { createDatabase, DEFAULT_DATABASE_URL, ensureSchema } from "../src/db/client";

async function main() {
  const url = process.env.TURSO_DATABASE_URL ?? DEFAULT_DATABASE_URL;
  const { libsql } = createDatabase({ url, authToken: process.env.TURSO_AUTH_TOKEN });

  try {
    await ensureSchema(libsql);
    console.log(`Schema applied to ${url.startsWith("file:") ? url.replace(/^file:/, "") : "remote Turso database"}`);
  } finally {
    libsql.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

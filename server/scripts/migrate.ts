/**
 * Applies pending SQL migrations from migrations/ to DATABASE_URL.
 *
 * Usage: npm run db:migrate
 */
import { pool, connectWithRetry } from "../db";
import { logConfigStatus } from "../config";
import { runMigrations } from "../migrate";

async function main() {
  logConfigStatus();
  await connectWithRetry();
  const applied = await runMigrations(pool);
  console.log(
    applied.length > 0
      ? `[migrate] Applied ${applied.length} migration(s): ${applied.join(", ")}`
      : "[migrate] Database is up to date"
  );
}

main()
  .catch((err) => {
    console.error("[migrate] Failed:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  })
  .finally(() => pool.end());

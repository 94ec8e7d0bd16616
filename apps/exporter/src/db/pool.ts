import pg from "pg";
import { env } from "../config/env.js";
import { logger } from "../log/logger.js";

/**
 * Shared connection pool for statistics queries.
 * Kept small: every scrape runs one short query per statistic.
 */
export const pool = new pg.Pool({
    connectionString: env.DATABASE_URL,
    max: env.PG_POOL_MAX,
    statement_timeout: env.PG_STATEMENT_TIMEOUT_MS,
    application_name: "pgstat-exporter",
});

// Idle clients can error when the server drops them; pg requires a listener.
pool.on("error", (err) => {
    logger.error({ err }, "Idle database client error");
});

/**
 * Verify the database answers a trivial query.
 */
export async function checkDatabase(): Promise<boolean> {
    try {
        await pool.query("SELECT 1");
        return true;
    } catch (err) {
        logger.warn({ err }, "Database check failed");
        return false;
    }
}

import { logger } from "./log/logger.js";
import { env } from "./config/env.js";
import { pool, checkDatabase } from "./db/pool.js";
import { createRegistry } from "./metrics/registry.js";
import { bindPostgresMetrics } from "./metrics/binder.js";
import { CounterReconciler } from "./reconcile/reconciler.js";
import { buildCatalog } from "./stats/catalog.js";
import { createStatFetcher } from "./stats/fetcher.js";
import { startExporterServer } from "./health/server.js";

async function main() {
    logger.info({ database: env.PG_DATABASE }, "Exporter starting...");

    // Verify database connection
    if (!(await checkDatabase())) {
        logger.fatal("Failed to connect to database");
        process.exit(1);
    }
    logger.info("Database connected");

    const { registry, fetchFailures } = createRegistry({
        database: env.PG_DATABASE,
        tags: env.METRIC_TAGS,
        collectDefaultMetrics: env.COLLECT_DEFAULT_METRICS,
    });
    const reconciler = new CounterReconciler();
    const fetcher = createStatFetcher({ client: pool, failures: fetchFailures });

    bindPostgresMetrics(registry, {
        statistics: buildCatalog(env.PG_DATABASE),
        fetcher,
        reconciler,
    });

    const server = startExporterServer(
        { registry, reconciler, database: env.PG_DATABASE, checkDatabase },
        env.EXPORTER_PORT
    );

    logger.info("Exporter started successfully");

    // Graceful shutdown
    const shutdown = async () => {
        logger.info("Shutting down...");
        await new Promise<void>((resolve) => server.close(() => resolve()));
        await pool.end();
        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ err }, "Shutdown failed");
            process.exit(1);
        });
    };

    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);
}

main().catch((err) => {
    logger.fatal({ err }, "Exporter crashed");
    process.exit(1);
});

import { Counter, Registry, collectDefaultMetrics } from "prom-client";
import { ExporterOptionsSchema, type ExporterOptionsInput } from "@pgstat/shared";
import type { FailureLabels } from "../stats/fetcher.js";

export interface ExporterRegistry {
    registry: Registry;
    /** Failed statistic fetches by statistic and reason */
    fetchFailures: Counter<FailureLabels>;
}

/**
 * Build the registry every exported metric is registered on.
 * Default labels carry the database name plus any configured tags.
 */
export function createRegistry(input: ExporterOptionsInput): ExporterRegistry {
    const options = ExporterOptionsSchema.parse(input);

    const registry = new Registry();
    registry.setDefaultLabels({ ...options.tags, database: options.database });

    if (options.collectDefaultMetrics) {
        collectDefaultMetrics({ register: registry, prefix: options.selfMetricsPrefix });
    }

    const fetchFailures = new Counter<FailureLabels>({
        name: `${options.selfMetricsPrefix}fetch_failures_total`,
        help: "Statistic fetches that failed and were reported as 0",
        labelNames: ["statistic", "reason"],
        registers: [registry],
    });

    return { registry, fetchFailures };
}

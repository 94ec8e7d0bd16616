import { Counter, Gauge, type Registry } from "prom-client";
import { StatisticKind } from "@pgstat/shared";
import { createChildLogger } from "../log/logger.js";
import type { CounterReconciler } from "../reconcile/reconciler.js";
import type { StatisticDefinition } from "../stats/catalog.js";
import type { StatFetcher } from "../stats/fetcher.js";

const logger = createChildLogger({ module: "binder" });

export interface BindDeps {
    statistics: StatisticDefinition[];
    fetcher: StatFetcher;
    reconciler: CounterReconciler;
}

function bindGauge(registry: Registry, definition: StatisticDefinition, fetcher: StatFetcher): void {
    new Gauge({
        name: definition.name,
        help: definition.help,
        registers: [registry],
        async collect() {
            this.set(await fetcher.fetchRaw(definition));
        },
    });
}

function bindCounter(
    registry: Registry,
    definition: StatisticDefinition,
    fetcher: StatFetcher,
    reconciler: CounterReconciler
): void {
    new Counter({
        name: definition.name,
        help: definition.help,
        registers: [registry],
        async collect() {
            const corrected = await reconciler.reconcileFrom(definition.name, () =>
                fetcher.fetchRaw(definition)
            );
            // Counters only go up through inc(); publish the absolute value.
            this.reset();
            this.inc(corrected);
        },
    });
}

/**
 * Register one metric per statistic. Every scrape fetches each statistic once;
 * counters pass through the reconciler so they never decrease.
 *
 * Returns the registered metric names.
 */
export function bindPostgresMetrics(registry: Registry, deps: BindDeps): string[] {
    const { statistics, fetcher, reconciler } = deps;

    for (const definition of statistics) {
        if (definition.kind === StatisticKind.COUNTER) {
            bindCounter(registry, definition, fetcher, reconciler);
        } else {
            bindGauge(registry, definition, fetcher);
        }
    }

    const names = statistics.map((s) => s.name);
    logger.info({ count: names.length }, "PostgreSQL metrics registered");
    return names;
}

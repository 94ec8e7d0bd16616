import { z } from "zod";
import type { Counter } from "prom-client";
import { FetchFailureReasons, StatisticKind, type FetchFailureReason } from "@pgstat/shared";
import { createChildLogger } from "../log/logger.js";
import type { StatisticDefinition } from "./catalog.js";

const logger = createChildLogger({ module: "fetcher" });

/**
 * The subset of pg.Pool the fetcher needs.
 */
export interface StatQueryClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export type FetchOutcome =
    | { ok: true; value: number }
    | { ok: false; reason: FetchFailureReason; error?: unknown };

export type FailureLabels = "statistic" | "reason";

export interface StatFetcher {
    /** Run the statistic's query and classify the result. Never rejects. */
    fetchOutcome(definition: StatisticDefinition): Promise<FetchOutcome>;
    /** Same as fetchOutcome, but failures collapse to 0. Never rejects. */
    fetchRaw(definition: StatisticDefinition): Promise<number>;
}

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// pg hands back bigint and numeric columns as strings
const RawValueSchema = z
    .union([
        z.number(),
        z.bigint().transform((v) => Number(v)),
        z.string().trim().regex(NUMERIC).transform(Number),
    ])
    .refine(Number.isFinite, "not a finite number");

function firstColumn(row: unknown): unknown {
    if (row === null || typeof row !== "object") return undefined;
    return Object.values(row)[0];
}

/**
 * Classify a query result: column 1 of row 1, parsed as a number.
 */
export function parseStatResult(rows: unknown[]): FetchOutcome {
    if (rows.length === 0) {
        return { ok: false, reason: FetchFailureReasons.EMPTY_RESULT };
    }
    const raw = firstColumn(rows[0]);
    if (raw === null) {
        return { ok: false, reason: FetchFailureReasons.NULL_VALUE };
    }
    const parsed = RawValueSchema.safeParse(raw);
    if (!parsed.success) {
        return { ok: false, reason: FetchFailureReasons.MALFORMED_VALUE, error: parsed.error };
    }
    return { ok: true, value: parsed.data };
}

export function createStatFetcher(deps: {
    client: StatQueryClient;
    failures?: Counter<FailureLabels>;
}): StatFetcher {
    const { client, failures } = deps;

    async function fetchOutcome(definition: StatisticDefinition): Promise<FetchOutcome> {
        let rows: unknown[];
        try {
            const result = await client.query(definition.query.text, definition.query.values);
            rows = result.rows;
        } catch (err) {
            return { ok: false, reason: FetchFailureReasons.QUERY_ERROR, error: err };
        }
        const outcome = parseStatResult(rows);
        // Counters only ever publish non-negative increments
        if (outcome.ok && definition.kind === StatisticKind.COUNTER && outcome.value < 0) {
            return {
                ok: false,
                reason: FetchFailureReasons.MALFORMED_VALUE,
                error: new Error(`negative counter reading: ${outcome.value}`),
            };
        }
        return outcome;
    }

    async function fetchRaw(definition: StatisticDefinition): Promise<number> {
        const outcome = await fetchOutcome(definition);
        if (outcome.ok) {
            return outcome.value;
        }

        logger.warn(
            { statistic: definition.name, reason: outcome.reason, err: outcome.error },
            "Statistic fetch failed, reporting 0"
        );
        failures?.inc({ statistic: definition.name, reason: outcome.reason });
        return 0;
    }

    return { fetchOutcome, fetchRaw };
}

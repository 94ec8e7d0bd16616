/**
 * Unit tests for the statistic fetcher.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { Counter, Registry } from "prom-client";
import { FetchFailureReasons, StatisticKind } from "@pgstat/shared";
import { createStatFetcher, parseStatResult, type FailureLabels, type StatQueryClient } from "./fetcher.js";
import type { StatisticDefinition } from "./catalog.js";

const blocksHits: StatisticDefinition = {
    name: "postgres_blocks_hits_total",
    help: "hits",
    kind: StatisticKind.COUNTER,
    query: { text: "SELECT blks_hit FROM pg_stat_database WHERE datname = $1", values: ["app"] },
};

function clientReturning(rows: unknown[]): StatQueryClient {
    return { query: vi.fn(async () => ({ rows })) };
}

describe("parseStatResult", () => {
    it("should read the first column of the first row", () => {
        expect(parseStatResult([{ blks_hit: 12 }, { blks_hit: 99 }])).toEqual({ ok: true, value: 12 });
    });

    it("should parse bigint columns returned as strings", () => {
        expect(parseStatResult([{ count: "9007199254" }])).toEqual({ ok: true, value: 9_007_199_254 });
    });

    it("should parse numeric strings with a fractional part", () => {
        expect(parseStatResult([{ sum: "12.5" }])).toEqual({ ok: true, value: 12.5 });
    });

    it("should parse bigint values", () => {
        expect(parseStatResult([{ size: 2048n }])).toEqual({ ok: true, value: 2048 });
    });

    it("should classify an empty result", () => {
        expect(parseStatResult([])).toEqual({ ok: false, reason: FetchFailureReasons.EMPTY_RESULT });
    });

    it("should classify SQL NULL", () => {
        // SUM over zero rows
        expect(parseStatResult([{ sum: null }])).toEqual({ ok: false, reason: FetchFailureReasons.NULL_VALUE });
    });

    it("should classify non-numeric values as malformed", () => {
        const outcome = parseStatResult([{ value: "not-a-number" }]);
        expect(outcome.ok).toBe(false);
        expect(outcome.ok ? undefined : outcome.reason).toBe(FetchFailureReasons.MALFORMED_VALUE);
    });

    it("should classify a row without columns as malformed", () => {
        const outcome = parseStatResult([{}]);
        expect(outcome.ok ? undefined : outcome.reason).toBe(FetchFailureReasons.MALFORMED_VALUE);
    });

    it("should reject infinite values", () => {
        const outcome = parseStatResult([{ value: Number.POSITIVE_INFINITY }]);
        expect(outcome.ok ? undefined : outcome.reason).toBe(FetchFailureReasons.MALFORMED_VALUE);
    });
});

describe("createStatFetcher", () => {
    let registry: Registry;
    let failures: Counter<FailureLabels>;

    beforeEach(() => {
        registry = new Registry();
        failures = new Counter<FailureLabels>({
            name: "fetch_failures_total",
            help: "failures",
            labelNames: ["statistic", "reason"],
            registers: [registry],
        });
    });

    async function failureCount(reason: string): Promise<number> {
        const data = await failures.get();
        const match = data.values.find(
            (v) => v.labels.statistic === blocksHits.name && v.labels.reason === reason
        );
        return match?.value ?? 0;
    }

    it("should pass the statistic's SQL and parameters to the client", async () => {
        const client = clientReturning([{ blks_hit: "7" }]);
        const fetcher = createStatFetcher({ client, failures });

        await fetcher.fetchRaw(blocksHits);

        expect(client.query).toHaveBeenCalledWith(blocksHits.query.text, ["app"]);
    });

    it("should return the parsed value on success", async () => {
        const fetcher = createStatFetcher({ client: clientReturning([{ blks_hit: "7" }]), failures });

        expect(await fetcher.fetchOutcome(blocksHits)).toEqual({ ok: true, value: 7 });
        expect(await fetcher.fetchRaw(blocksHits)).toBe(7);
    });

    it("should report a thrown query error as QUERY_ERROR without rejecting", async () => {
        const error = new Error("connection refused");
        const client: StatQueryClient = {
            query: vi.fn(async () => {
                throw error;
            }),
        };
        const fetcher = createStatFetcher({ client, failures });

        expect(await fetcher.fetchOutcome(blocksHits)).toEqual({
            ok: false,
            reason: FetchFailureReasons.QUERY_ERROR,
            error,
        });
    });

    it("should collapse every failure to 0 and count it", async () => {
        const fetcher = createStatFetcher({ client: clientReturning([]), failures });

        expect(await fetcher.fetchRaw(blocksHits)).toBe(0);
        expect(await fetcher.fetchRaw(blocksHits)).toBe(0);
        expect(await failureCount(FetchFailureReasons.EMPTY_RESULT)).toBe(2);
    });

    it("should not count successful fetches", async () => {
        const fetcher = createStatFetcher({ client: clientReturning([{ blks_hit: 1 }]), failures });

        await fetcher.fetchRaw(blocksHits);

        const data = await failures.get();
        expect(data.values).toEqual([]);
    });

    it("should classify a negative counter reading as malformed", async () => {
        const fetcher = createStatFetcher({ client: clientReturning([{ blks_hit: "-5" }]), failures });

        const outcome = await fetcher.fetchOutcome(blocksHits);
        expect(outcome.ok ? undefined : outcome.reason).toBe(FetchFailureReasons.MALFORMED_VALUE);
        expect(await fetcher.fetchRaw(blocksHits)).toBe(0);
        expect(await failureCount(FetchFailureReasons.MALFORMED_VALUE)).toBe(1);
    });

    it("should accept a negative gauge reading", async () => {
        const gauge: StatisticDefinition = { ...blocksHits, kind: StatisticKind.GAUGE };
        const fetcher = createStatFetcher({ client: clientReturning([{ delta: "-5" }]), failures });

        expect(await fetcher.fetchOutcome(gauge)).toEqual({ ok: true, value: -5 });
    });

    it("should work without a failure counter", async () => {
        const fetcher = createStatFetcher({ client: clientReturning([{ sum: null }]) });

        expect(await fetcher.fetchRaw(blocksHits)).toBe(0);
    });
});

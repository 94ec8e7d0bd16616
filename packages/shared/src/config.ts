import { z } from "zod";

/**
 * Metric label names must match the Prometheus label grammar and must not
 * use the reserved `__` prefix.
 */
const LabelNameSchema = z
    .string()
    .regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/, "invalid label name")
    .refine((name) => !name.startsWith("__"), "label names starting with __ are reserved");

/**
 * Extra labels attached to every exported metric.
 * `database` is always set by the exporter and cannot be overridden here.
 */
export const MetricTagsSchema = z
    .record(LabelNameSchema, z.string())
    .refine((tags) => !("database" in tags), "the database label is reserved")
    .default({});

export type MetricTags = z.infer<typeof MetricTagsSchema>;

/**
 * Exporter options schema.
 */
export const ExporterOptionsSchema = z.object({
    /** Database name used to filter pg_stat_database and pg_locks */
    database: z.string().min(1),
    /** Extra default labels (default: none) */
    tags: MetricTagsSchema,
    /** Whether prom-client's process metrics are exported (default: true) */
    collectDefaultMetrics: z.boolean().default(true),
    /** Prefix for the exporter's own metrics (default: "pgstat_exporter_") */
    selfMetricsPrefix: z
        .string()
        .regex(/^[a-zA-Z_:][a-zA-Z0-9_:]*$/)
        .default("pgstat_exporter_"),
});

export type ExporterOptions = z.infer<typeof ExporterOptionsSchema>;
export type ExporterOptionsInput = z.input<typeof ExporterOptionsSchema>;

/**
 * Parse a `k=v,k2=v2` tag list.
 * Whitespace around keys and values is trimmed; empty segments are skipped.
 */
export function parseTagList(raw: string): Record<string, string> {
    const tags: Record<string, string> = {};
    for (const segment of raw.split(",")) {
        const trimmed = segment.trim();
        if (trimmed === "") continue;
        const eq = trimmed.indexOf("=");
        if (eq <= 0) {
            throw new Error(`Invalid tag "${trimmed}": expected key=value`);
        }
        tags[trimmed.slice(0, eq).trim()] = trimmed.slice(eq + 1).trim();
    }
    return tags;
}

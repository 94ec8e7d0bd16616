/**
 * Locked reason codes for failed statistic fetches.
 * These become the `reason` label on the fetch failure counter.
 */
export const FetchFailureReasons = {
    /** The query threw (connection refused, timeout, SQL error) */
    QUERY_ERROR: "QUERY_ERROR",
    /** The query returned no rows */
    EMPTY_RESULT: "EMPTY_RESULT",
    /** The first column of the first row was SQL NULL */
    NULL_VALUE: "NULL_VALUE",
    /** The value could not be read as a finite number */
    MALFORMED_VALUE: "MALFORMED_VALUE",
} as const;

export type FetchFailureReason = (typeof FetchFailureReasons)[keyof typeof FetchFailureReasons];

/**
 * Kinds of exported statistics.
 * - gauge: published as read
 * - counter: reconciled so the published value never decreases
 */
export const StatisticKind = {
    GAUGE: "gauge",
    COUNTER: "counter",
} as const;

export type StatisticKindType = (typeof StatisticKind)[keyof typeof StatisticKind];

import { StatisticKind, type StatisticKindType } from "@pgstat/shared";

export interface StatQuery {
    text: string;
    values: unknown[];
}

export interface StatisticDefinition {
    /** Prometheus metric name; counters also use it as their reconciliation key */
    name: string;
    help: string;
    kind: StatisticKindType;
    query: StatQuery;
}

function dbStatQuery(database: string, statExpression: string): StatQuery {
    return {
        text: `SELECT ${statExpression} FROM pg_stat_database WHERE datname = $1`,
        values: [database],
    };
}

function bgWriterQuery(column: string): StatQuery {
    return { text: `SELECT ${column} FROM pg_stat_bgwriter`, values: [] };
}

function gauge(name: string, help: string, query: StatQuery): StatisticDefinition {
    return { name, help, kind: StatisticKind.GAUGE, query };
}

function counter(name: string, help: string, query: StatQuery): StatisticDefinition {
    return { name, help, kind: StatisticKind.COUNTER, query };
}

/**
 * Build the list of exported statistics for one database.
 *
 * pg_stat_bgwriter and pg_stat_user_tables are not filtered by database:
 * the former is cluster-wide, the latter is scoped to the connected database.
 *
 * PostgreSQL 17 moved checkpoints_timed, checkpoints_req and buffers_checkpoint
 * to pg_stat_checkpointer and dropped buffers_backend. On those servers the
 * bgwriter counters below fail with QUERY_ERROR and hold their last value.
 */
export function buildCatalog(database: string): StatisticDefinition[] {
    return [
        gauge("postgres_size_bytes", "The database size", {
            text: "SELECT pg_database_size($1)",
            values: [database],
        }),
        gauge(
            "postgres_connections",
            "Number of active connections to the given db",
            dbStatQuery(database, "SUM(numbackends)")
        ),
        gauge("postgres_locks", "Number of locks on the given db", {
            text: "SELECT count(*) FROM pg_locks l JOIN pg_database d ON l.database = d.oid WHERE d.datname = $1",
            values: [database],
        }),
        gauge("postgres_rows_dead", "Total number of dead rows in the current database", {
            text: "SELECT SUM(n_dead_tup) FROM pg_stat_user_tables",
            values: [],
        }),

        // Hit ratio can be derived from dividing hits/reads
        counter(
            "postgres_blocks_hits_total",
            "Number of times disk blocks were found already in the buffer cache, so that a read was not necessary",
            dbStatQuery(database, "blks_hit")
        ),
        counter(
            "postgres_blocks_reads_total",
            "Number of disk blocks read in this database",
            dbStatQuery(database, "blks_read")
        ),
        counter(
            "postgres_transactions_total",
            "Total number of transactions executed (commits + rollbacks)",
            dbStatQuery(database, "xact_commit + xact_rollback")
        ),
        counter(
            "postgres_temp_writes_bytes_total",
            "The total amount of temporary writes to disk to execute queries",
            dbStatQuery(database, "temp_bytes")
        ),

        counter("postgres_rows_fetched_total", "Number of rows fetched from the db", dbStatQuery(database, "tup_fetched")),
        counter("postgres_rows_inserted_total", "Number of rows inserted from the db", dbStatQuery(database, "tup_inserted")),
        counter("postgres_rows_updated_total", "Number of rows updated from the db", dbStatQuery(database, "tup_updated")),
        counter("postgres_rows_deleted_total", "Number of rows deleted from the db", dbStatQuery(database, "tup_deleted")),

        counter("postgres_checkpoints_timed_total", "Number of checkpoints timed", bgWriterQuery("checkpoints_timed")),
        counter("postgres_checkpoints_requested_total", "Number of checkpoints requested", bgWriterQuery("checkpoints_req")),
        counter(
            "postgres_buffers_checkpoint_total",
            "Number of buffers written during checkpoints",
            bgWriterQuery("buffers_checkpoint")
        ),
        counter(
            "postgres_buffers_clean_total",
            "Number of buffers written by the background writer",
            bgWriterQuery("buffers_clean")
        ),
        counter(
            "postgres_buffers_backend_total",
            "Number of buffers written directly by a backend",
            bgWriterQuery("buffers_backend")
        ),
    ];
}

import { createServer, IncomingMessage, Server, ServerResponse } from "http";
import type { Registry } from "prom-client";
import { logger } from "../log/logger.js";
import type { CounterReconciler } from "../reconcile/reconciler.js";

export interface ServerDeps {
    registry: Registry;
    reconciler: CounterReconciler;
    database: string;
    checkDatabase: () => Promise<boolean>;
}

interface HealthStatus {
    status: "ok" | "unhealthy";
    timestamp: string;
    database: string;
    dbConnected: boolean;
    /** Counters with reconciliation state (seen by at least one scrape) */
    trackedCounters: number;
    /** Statistics resets detected since start */
    resetsDetected: number;
}

async function getHealthStatus(deps: ServerDeps): Promise<HealthStatus> {
    const dbConnected = await deps.checkDatabase();

    return {
        status: dbConnected ? "ok" : "unhealthy",
        timestamp: new Date().toISOString(),
        database: deps.database,
        dbConnected,
        trackedCounters: deps.reconciler.size,
        resetsDetected: deps.reconciler.totalResets,
    };
}

function sendError(res: ServerResponse, err: unknown): void {
    res.writeHead(500, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ status: "error", error: String(err) }));
}

function handleRequest(deps: ServerDeps, req: IncomingMessage, res: ServerResponse) {
    if (req.url === "/metrics" && req.method === "GET") {
        deps.registry
            .metrics()
            .then((body) => {
                res.writeHead(200, { "Content-Type": deps.registry.contentType });
                res.end(body);
            })
            .catch((err) => {
                logger.error({ err }, "Metrics scrape failed");
                sendError(res, err);
            });
    } else if (req.url === "/health" && req.method === "GET") {
        getHealthStatus(deps)
            .then((status) => {
                const statusCode = status.status === "unhealthy" ? 503 : 200;
                res.writeHead(statusCode, { "Content-Type": "application/json" });
                res.end(JSON.stringify(status));
            })
            .catch((err) => {
                logger.error({ err }, "Health check failed");
                sendError(res, err);
            });
    } else {
        res.writeHead(404);
        res.end("Not Found");
    }
}

export function createExporterServer(deps: ServerDeps): Server {
    return createServer((req, res) => handleRequest(deps, req, res));
}

export function startExporterServer(deps: ServerDeps, port: number): Server {
    const server = createExporterServer(deps);
    server.listen(port, () => {
        logger.info({ port }, "Exporter server started");
    });
    return server;
}

import { Counter, Histogram, Registry } from "prom-client";

/**
 * Prometheus metrics for one app instance.
 * Each app gets its own registry so several apps (tests) can coexist in a process.
 */
export interface Metrics {
    registry: Registry;
    requestCount: Counter<"method" | "endpoint" | "http_status">;
    requestLatency: Histogram<"method" | "endpoint">;
    pvzCreated: Counter;
    receptionsCreated: Counter;
    productsAdded: Counter;
}

export function createMetrics(): Metrics {
    const registry = new Registry();
    return {
        registry,
        requestCount: new Counter({
            name: "request_count",
            help: "App Request Count",
            labelNames: ["method", "endpoint", "http_status"],
            registers: [registry]
        }),
        requestLatency: new Histogram({
            name: "request_latency_seconds",
            help: "Request latency",
            labelNames: ["method", "endpoint"],
            registers: [registry]
        }),
        pvzCreated: new Counter({
            name: "pvz_created_total",
            help: "Total number of PVZs created",
            registers: [registry]
        }),
        receptionsCreated: new Counter({
            name: "receptions_created_total",
            help: "Total number of receptions created",
            registers: [registry]
        }),
        productsAdded: new Counter({
            name: "products_added_total",
            help: "Total number of products added",
            registers: [registry]
        })
    };
}

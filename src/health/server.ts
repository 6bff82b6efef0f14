/**
 * Fastify server exposing relay health.
 *
 * Routes:
 *   GET /health   plain "OK" liveness check
 *   GET /metrics  counters from the MetricsCollector
 *   GET /status   metrics plus confirmation, poller and dedup state
 */

import Fastify, { type FastifyInstance } from "fastify";

import type { RelayCore } from "../relay/core.js";

export interface HealthServerOptions {
	core: Pick<RelayCore, "metrics" | "registryStats" | "pollerStatus" | "dedupStats">;
	logLevel?: string;
}

export async function buildHealthServer(opts: HealthServerOptions): Promise<FastifyInstance> {
	const { core } = opts;

	const server = Fastify({
		logger: { level: opts.logLevel ?? "warn" },
	});

	server.get("/health", async (_request, reply) => {
		return reply.type("text/plain").send("OK");
	});

	server.get("/metrics", async (_request, reply) => {
		return reply.send(core.metrics.snapshot());
	});

	server.get("/status", async (_request, reply) => {
		return reply.send({
			status: core.metrics.healthState(),
			metrics: core.metrics.snapshot(),
			confirmations: core.registryStats(),
			inbound: core.pollerStatus(),
			dedup: core.dedupStats(),
		});
	});

	return server;
}

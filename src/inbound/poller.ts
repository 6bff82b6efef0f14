import type { MetricsCollector } from "../health/metrics.js";
import type { Result } from "../infra/errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { ResilientCaller } from "../resilience/resilient-caller.js";
import { interruptibleSleep } from "../utils.js";
import type { DedupStore } from "./dedup-store.js";
import type { Forwarder } from "./forwarder.js";
import type { FetchInbound } from "./types.js";

const logger = getChildLogger({ module: "inbound-poller" });

const FETCH_OPERATION = "fetch_direct_messages";

export type InboundPollerOptions = {
	pollIntervalMs: number;
	pageSize: number;
	errorBackoffCapMs: number;
	now?: () => number;
};

export type InboundPollerDeps = {
	caller: ResilientCaller;
	store: DedupStore;
	forwarder: Forwarder;
	fetchInbound: FetchInbound;
	/** false when inbound forwarding is configured off; start() is then a no-op */
	enabled?: boolean;
	metrics?: MetricsCollector;
	/** Idle wait between iterations; must resolve early once the signal aborts. */
	wait?: (ms: number, signal: AbortSignal) => Promise<void>;
};

export type PollSummary = {
	fetched: number;
	skipped: number;
	forwarded: number;
	failed: number;
};

export type InboundPollerStatus = {
	running: boolean;
	enabled: boolean;
	pollIntervalMs: number;
	processedCount: number;
	lastPollAt: string | null;
	lastError: string | null;
	consecutiveFetchFailures: number;
};

/**
 * Background loop: fetch inbound DMs, skip the ones already delivered,
 * forward the rest in order, and remember each one only after it arrived.
 */
export class InboundPoller {
	private loop: Promise<void> | null = null;
	private controller: AbortController | null = null;
	private inFlight: Promise<Result<PollSummary>> | null = null;
	private processedCount = 0;
	private lastPollAt: number | null = null;
	private lastError: string | null = null;
	private consecutiveFetchFailures = 0;
	private readonly now: () => number;
	private readonly wait: (ms: number, signal: AbortSignal) => Promise<void>;

	constructor(
		private readonly options: InboundPollerOptions,
		private readonly deps: InboundPollerDeps,
	) {
		this.now = options.now ?? Date.now;
		this.wait = deps.wait ?? interruptibleSleep;
	}

	get enabled(): boolean {
		return this.deps.enabled ?? true;
	}

	get running(): boolean {
		return this.loop !== null;
	}

	start(): void {
		if (this.loop) return;
		if (!this.enabled) {
			logger.info("inbound polling disabled; not starting");
			return;
		}
		const controller = new AbortController();
		this.controller = controller;
		this.loop = this.run(controller.signal);
		logger.info(
			{ pollIntervalMs: this.options.pollIntervalMs, pageSize: this.options.pageSize },
			"inbound poller started",
		);
	}

	/** Stop the loop and wait for the current iteration to finish. */
	async stop(): Promise<void> {
		const loop = this.loop;
		if (!loop) return;
		this.controller?.abort();
		await loop;
		this.loop = null;
		this.controller = null;
		logger.info("inbound poller stopped");
	}

	/**
	 * Run one fetch-filter-forward pass. Concurrent calls share the pass
	 * already in progress so no message is forwarded twice.
	 */
	pollOnce(): Promise<Result<PollSummary>> {
		if (this.inFlight) return this.inFlight;
		const pass = this.runPass().finally(() => {
			this.inFlight = null;
		});
		this.inFlight = pass;
		return pass;
	}

	status(): InboundPollerStatus {
		return {
			running: this.running,
			enabled: this.enabled,
			pollIntervalMs: this.options.pollIntervalMs,
			processedCount: this.processedCount,
			lastPollAt: this.lastPollAt === null ? null : new Date(this.lastPollAt).toISOString(),
			lastError: this.lastError,
			consecutiveFetchFailures: this.consecutiveFetchFailures,
		};
	}

	private async run(signal: AbortSignal): Promise<void> {
		const { pollIntervalMs, errorBackoffCapMs } = this.options;
		while (!signal.aborted) {
			let fetchOk = false;
			try {
				const result = await this.pollOnce();
				fetchOk = result.success;
			} catch (err) {
				this.lastError = formatErrorSafe(err);
				logger.error({ error: this.lastError }, "inbound poll pass crashed");
			}
			if (signal.aborted) break;
			const delay = fetchOk ? pollIntervalMs : Math.min(pollIntervalMs * 2, errorBackoffCapMs);
			await this.wait(delay, signal);
		}
	}

	private async runPass(): Promise<Result<PollSummary>> {
		const { pageSize } = this.options;
		const fetched = await this.deps.caller.call(
			FETCH_OPERATION,
			() => this.deps.fetchInbound(pageSize),
			[pageSize],
			{ cache: false },
		);
		this.lastPollAt = this.now();

		if (!fetched.success) {
			this.consecutiveFetchFailures++;
			this.lastError = fetched.error.message;
			this.deps.metrics?.recordFetchError(fetched.error.kind);
			logger.warn(
				{ kind: fetched.error.kind, consecutiveFailures: this.consecutiveFetchFailures },
				"fetching inbound messages failed",
			);
			return fetched;
		}

		this.consecutiveFetchFailures = 0;
		this.lastError = null;

		const summary: PollSummary = { fetched: fetched.data.length, skipped: 0, forwarded: 0, failed: 0 };
		for (const message of fetched.data) {
			if (this.deps.store.isProcessed(message.id)) {
				summary.skipped++;
				continue;
			}

			const forwarded = await this.deps.forwarder.forward(message);
			if (!forwarded.success) {
				summary.failed++;
				this.deps.metrics?.recordForwardFailed();
				logger.error(
					{ messageId: message.id, error: formatErrorSafe(forwarded.error.cause ?? forwarded.error) },
					"forwarding inbound message failed; will retry next poll",
				);
				continue;
			}

			try {
				this.deps.store.markProcessed(message.id);
			} catch (err) {
				// Still marked in memory; only a restart could re-deliver it
				logger.error(
					{ messageId: message.id, error: formatErrorSafe(err) },
					"failed to persist processed message id",
				);
			}
			summary.forwarded++;
			this.processedCount++;
			this.deps.metrics?.recordForwarded();
		}

		if (summary.forwarded > 0 || summary.failed > 0) {
			logger.info(summary, "inbound poll pass finished");
		} else {
			logger.debug(summary, "inbound poll pass finished");
		}
		return { success: true, data: summary };
	}
}

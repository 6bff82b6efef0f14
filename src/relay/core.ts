import type { RelaySettings } from "../config/config.js";
import { ConfirmationRegistry, type ConfirmationRegistryStats } from "../confirmation/registry.js";
import type { MediaRef, PendingPost, PendingPostIdentity } from "../confirmation/types.js";
import {
	type ConfirmOutcome,
	ConfirmationWorkflow,
	type PostExecutor,
	type PostOutcome,
} from "../confirmation/workflow.js";
import { MetricsCollector } from "../health/metrics.js";
import { DedupStore, type DedupStoreStats } from "../inbound/dedup-store.js";
import { Forwarder } from "../inbound/forwarder.js";
import { InboundPoller, type InboundPollerStatus, type PollSummary } from "../inbound/poller.js";
import type { DeliverToChat, FetchInbound } from "../inbound/types.js";
import type { Result, StateConflictError, ValidationFailedError } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { ResilientCaller } from "../resilience/resilient-caller.js";
import type { XIdentity } from "../social/x-client.js";

const logger = getChildLogger({ module: "relay-core" });

export type RelayCoreDeps = {
	settings: RelaySettings;
	postExecutor: PostExecutor;
	fetchInbound: FetchInbound;
	deliver: DeliverToChat;
	verifyCredentials?: () => Promise<XIdentity>;
	metrics?: MetricsCollector;
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
	wait?: (ms: number, signal: AbortSignal) => Promise<void>;
};

/**
 * Owns every stateful component of the relay and the order they start and
 * stop in. Transports (Telegram, X) talk to the relay only through this.
 */
export class RelayCore {
	readonly metrics: MetricsCollector;
	readonly confirmationEnabled: boolean;
	private readonly registry: ConfirmationRegistry;
	private readonly caller: ResilientCaller;
	private readonly workflow: ConfirmationWorkflow;
	private readonly store: DedupStore;
	private readonly poller: InboundPoller;
	private readonly verifyCredentials?: () => Promise<XIdentity>;
	private started = false;

	constructor(deps: RelayCoreDeps) {
		const { settings } = deps;
		const now = deps.now ?? Date.now;

		this.metrics = deps.metrics ?? new MetricsCollector(now);
		this.confirmationEnabled = settings.confirmation.enabled;
		this.verifyCredentials = deps.verifyCredentials;
		this.registry = new ConfirmationRegistry(settings.confirmation, { now });
		this.caller = new ResilientCaller(settings.resilience, { now, sleep: deps.sleep });
		this.workflow = new ConfirmationWorkflow(this.registry, this.caller, deps.postExecutor);
		this.store = new DedupStore(settings.dedup, { now });
		this.poller = new InboundPoller(
			{
				pollIntervalMs: settings.inbound.pollIntervalMs,
				pageSize: settings.inbound.pageSize,
				errorBackoffCapMs: settings.inbound.errorBackoffCapMs,
				now,
			},
			{
				caller: this.caller,
				store: this.store,
				forwarder: new Forwarder(deps.deliver),
				fetchInbound: deps.fetchInbound,
				enabled: settings.inbound.enabled,
				metrics: this.metrics,
				wait: deps.wait,
			},
		);
	}

	/** Start the expiry sweep and the inbound poller. */
	start(): void {
		if (this.started) return;
		this.started = true;
		this.registry.start();
		const removed = this.store.compact();
		if (removed > 0) {
			logger.info({ removed }, "compacted dedup store on start");
		}
		this.startPolling();
	}

	// ── Confirmation ─────────────────────────────────────────────────────────

	createConfirmation(
		identity: PendingPostIdentity,
		text: string,
		media: readonly MediaRef[] = [],
	): Result<PendingPost, ValidationFailedError> {
		return this.workflow.submit(identity, text, media);
	}

	async confirm(key: string): Promise<ConfirmOutcome> {
		return this.recordOutcome(await this.workflow.confirmAndPost(key));
	}

	async retry(key: string): Promise<ConfirmOutcome> {
		return this.recordOutcome(await this.workflow.retry(key));
	}

	setEditing(key: string): Result<PendingPost, StateConflictError> {
		return this.workflow.beginEdit(key);
	}

	resubmitEditing(
		requesterId: string,
		channelId: string,
		text: string,
		media?: readonly MediaRef[],
	): Result<PendingPost, ValidationFailedError> | null {
		return this.workflow.resubmitEditing(requesterId, channelId, text, media);
	}

	cancel(key: string): boolean {
		return this.workflow.cancel(key);
	}

	abandon(key: string): boolean {
		return this.workflow.abandon(key);
	}

	async postDirect(text: string, media: readonly MediaRef[] = []): Promise<PostOutcome> {
		const outcome = await this.workflow.postDirect(text, media);
		if (outcome.success) this.metrics.recordPostSent();
		else this.metrics.recordPostFailed(outcome.error.kind);
		return outcome;
	}

	registryStats(): ConfirmationRegistryStats {
		return this.registry.stats();
	}

	// ── Inbound ──────────────────────────────────────────────────────────────

	startPolling(): void {
		this.poller.start();
	}

	stopPolling(): Promise<void> {
		return this.poller.stop();
	}

	pollNow(): Promise<Result<PollSummary>> {
		return this.poller.pollOnce();
	}

	pollerStatus(): InboundPollerStatus {
		return this.poller.status();
	}

	dedupStats(): DedupStoreStats {
		return this.store.stats();
	}

	/** Account behind the X token; cached by the ResilientCaller. */
	async xIdentity(): Promise<Result<XIdentity> | null> {
		const verify = this.verifyCredentials;
		if (!verify) return null;
		return this.caller.call("verify_credentials", () => verify(), []);
	}

	/** Stop the poller (waiting for its current pass), then the sweep. */
	async shutdown(): Promise<void> {
		await this.poller.stop();
		this.registry.stop();
		this.started = false;
		logger.info("relay core stopped");
	}

	private recordOutcome(outcome: ConfirmOutcome): ConfirmOutcome {
		if (outcome.status === "posted") this.metrics.recordPostSent();
		else if (outcome.status === "failed") this.metrics.recordPostFailed(outcome.error.kind);
		return outcome;
	}
}

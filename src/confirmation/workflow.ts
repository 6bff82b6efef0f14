import {
	type RelayError,
	type Result,
	StateConflictError,
	type ValidationFailedError,
} from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import type { ResilientCaller } from "../resilience/resilient-caller.js";
import type { ConfirmationRegistry } from "./registry.js";
import type { MediaRef, PendingPost, PendingPostIdentity } from "./types.js";

const logger = getChildLogger({ module: "confirmation-workflow" });

export type PostReceipt = {
	id: string;
	url: string;
};

/** Publishes one post. Throws TransportError on failure. */
export type PostExecutor = (text: string, media: readonly MediaRef[]) => Promise<PostReceipt>;

export type PostOutcome =
	| { success: true; id: string; url: string }
	| { success: false; error: RelayError };

export type ConfirmOutcome =
	| { status: "posted"; post: PendingPost; receipt: PostReceipt }
	/**
	 * Posting failed; the entry was re-armed as Pending under `key` for a retry.
	 * `attempt` counts the failed tries of this content, starting at 1.
	 */
	| { status: "failed"; post: PendingPost; error: RelayError; key: string; attempt: number }
	| { status: "conflict"; error: StateConflictError };

const CREATE_POST_OPERATION = "create_post";

/**
 * Drives a post from submission to publication through the registry.
 */
export class ConfirmationWorkflow {
	private readonly failures = new Map<string, number>();

	constructor(
		private readonly registry: ConfirmationRegistry,
		private readonly caller: ResilientCaller,
		private readonly executor: PostExecutor,
	) {}

	submit(
		identity: PendingPostIdentity,
		text: string,
		media: readonly MediaRef[] = [],
	): Result<PendingPost, ValidationFailedError> {
		const created = this.registry.create(identity, text, media);
		if (!created.success) return created;
		const post = this.registry.get(created.data);
		if (!post) {
			throw new Error(`confirmation ${created.data} vanished right after creation`);
		}
		return { success: true, data: post };
	}

	/**
	 * Confirm and publish. On failure the same content is stored again as a
	 * fresh Pending entry so the requester can retry or abandon it.
	 */
	async confirmAndPost(key: string): Promise<ConfirmOutcome> {
		if (this.registry.isExpired(key)) {
			const known = this.registry.get(key) !== null;
			// Let confirm() perform the Expired transition and removal
			this.registry.confirm(key);
			return {
				status: "conflict",
				error: new StateConflictError(key, known ? "expired" : "not_found"),
			};
		}

		const post = this.registry.confirm(key);
		if (!post) {
			return { status: "conflict", error: new StateConflictError(key, "wrong_state") };
		}

		const outcome = await this.executePost(post.text, post.media);
		this.registry.complete(key);

		if (outcome.success) {
			this.failures.delete(key);
			logger.info({ key, postId: outcome.id }, "post published");
			return { status: "posted", post, receipt: { id: outcome.id, url: outcome.url } };
		}

		const attempt = (this.failures.get(key) ?? 0) + 1;
		this.failures.delete(key);
		const rearmed = this.registry.create(post, post.text, post.media);
		if (!rearmed.success) {
			// Content was valid a moment ago; this only happens if limits changed
			return { status: "failed", post, error: outcome.error, key, attempt };
		}
		this.pruneFailures();
		this.failures.set(rearmed.data, attempt);
		logger.warn({ key, kind: outcome.error.kind, attempt }, "post failed; confirmation re-armed for retry");
		return { status: "failed", post, error: outcome.error, key: rearmed.data, attempt };
	}

	/** Retry a failed post. Identical to confirming the re-armed entry. */
	retry(key: string): Promise<ConfirmOutcome> {
		return this.confirmAndPost(key);
	}

	beginEdit(key: string): Result<PendingPost, StateConflictError> {
		if (this.registry.isExpired(key)) {
			const known = this.registry.get(key) !== null;
			return { success: false, error: new StateConflictError(key, known ? "expired" : "not_found") };
		}
		if (!this.registry.setEditing(key)) {
			return { success: false, error: new StateConflictError(key, "wrong_state") };
		}
		const post = this.registry.get(key);
		if (!post) return { success: false, error: new StateConflictError(key, "not_found") };
		return { success: true, data: post };
	}

	/**
	 * Treat a new message as replacement content for the requester's entry
	 * under edit. Returns null when nothing is being edited in this channel.
	 */
	resubmitEditing(
		requesterId: string,
		channelId: string,
		text: string,
		media?: readonly MediaRef[],
	): Result<PendingPost, ValidationFailedError> | null {
		const key = this.registry.findEditing(requesterId, channelId);
		if (!key) return null;
		return this.registry.resubmit(key, text, media);
	}

	cancel(key: string): boolean {
		this.failures.delete(key);
		return this.registry.cancel(key);
	}

	/** Drop a failed post instead of retrying it. */
	abandon(key: string): boolean {
		this.failures.delete(key);
		return this.registry.cancel(key);
	}

	/** Publish without a confirmation step (confirmation disabled). */
	async postDirect(text: string, media: readonly MediaRef[] = []): Promise<PostOutcome> {
		const invalid = this.registry.checkContent(text, media);
		if (invalid) return { success: false, error: invalid };
		return this.executePost(text, media);
	}

	// Failed entries that expired or were swept away
	private pruneFailures(): void {
		for (const key of this.failures.keys()) {
			if (this.registry.get(key) === null) this.failures.delete(key);
		}
	}

	private async executePost(text: string, media: readonly MediaRef[]): Promise<PostOutcome> {
		const result = await this.caller.call(
			CREATE_POST_OPERATION,
			() => this.executor(text, media),
			[text, media.length],
			{ cache: false },
		);
		if (!result.success) return { success: false, error: result.error };
		return { success: true, id: result.data.id, url: result.data.url };
	}
}

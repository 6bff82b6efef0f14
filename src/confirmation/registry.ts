import { type Result, ValidationFailedError } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";
import { codePointLength } from "../utils.js";
import {
	type MediaRef,
	type PendingPost,
	type PendingPostIdentity,
	confirmationKey,
} from "./types.js";

const logger = getChildLogger({ module: "confirmation-registry" });

export type ConfirmationRegistryOptions = {
	timeoutMs: number;
	sweepIntervalMs: number;
	maxTextLength: number;
	maxMediaItems: number;
};

export type ConfirmationRegistryStats = {
	total: number;
	pending: number;
	editing: number;
	sweepRunning: boolean;
};

function snapshot(entry: PendingPost): PendingPost {
	return Object.freeze({ ...entry, media: Object.freeze([...entry.media]) });
}

/**
 * In-memory table of posts awaiting an approve / edit / cancel decision.
 *
 * Entries live until they are completed, cancelled, or expire. Every
 * transition is a synchronous check-and-set on one key.
 */
export class ConfirmationRegistry {
	private readonly entries = new Map<string, PendingPost>();
	private sweepTimer: NodeJS.Timeout | null = null;
	private readonly now: () => number;

	constructor(
		private readonly options: ConfirmationRegistryOptions,
		deps: { now?: () => number } = {},
	) {
		this.now = deps.now ?? Date.now;
	}

	/**
	 * Store a new Pending entry. Overwrites an entry with the same identity.
	 * Over-long text and too many media items are rejected, never truncated.
	 */
	create(
		identity: PendingPostIdentity,
		text: string,
		media: readonly MediaRef[] = [],
	): Result<string, ValidationFailedError> {
		const invalid = this.checkContent(text, media);
		if (invalid) return { success: false, error: invalid };

		const key = confirmationKey(identity);
		const createdAt = this.now();
		if (this.entries.has(key)) {
			logger.debug({ key }, "replacing existing confirmation");
		}
		this.entries.set(key, {
			...identity,
			key,
			text,
			media: [...media],
			createdAt,
			expiresAt: createdAt + this.options.timeoutMs,
			status: "pending",
		});
		logger.info({ key, textLength: codePointLength(text), media: media.length }, "confirmation created");
		return { success: true, data: key };
	}

	get(key: string): PendingPost | null {
		const entry = this.entries.get(key);
		return entry ? snapshot(entry) : null;
	}

	/** Absent keys count as expired. */
	isExpired(key: string): boolean {
		const entry = this.entries.get(key);
		if (!entry) return true;
		return this.now() > entry.expiresAt;
	}

	/**
	 * Pending → Confirmed. Expiry wins: an expired entry is removed and null
	 * returned even if it was never swept.
	 */
	confirm(key: string): PendingPost | null {
		const entry = this.entries.get(key);
		if (!entry) return null;

		if (this.now() > entry.expiresAt) {
			entry.status = "expired";
			this.entries.delete(key);
			logger.info({ key }, "confirmation expired on confirm");
			return null;
		}
		if (entry.status !== "pending") return null;

		entry.status = "confirmed";
		logger.info({ key }, "confirmation confirmed");
		return snapshot(entry);
	}

	/** Pending → Editing. */
	setEditing(key: string): boolean {
		const entry = this.entries.get(key);
		if (!entry || entry.status !== "pending") return false;
		entry.status = "editing";
		return true;
	}

	/**
	 * Editing → Pending with replacement content. The expiry window restarts.
	 * Returns null when the entry is absent or not being edited.
	 */
	resubmit(
		key: string,
		text: string,
		media?: readonly MediaRef[],
	): Result<PendingPost, ValidationFailedError> | null {
		const entry = this.entries.get(key);
		if (!entry || entry.status !== "editing") return null;

		const nextMedia = media ?? entry.media;
		const invalid = this.checkContent(text, nextMedia);
		if (invalid) return { success: false, error: invalid };

		const createdAt = this.now();
		entry.text = text;
		entry.media = [...nextMedia];
		entry.createdAt = createdAt;
		entry.expiresAt = createdAt + this.options.timeoutMs;
		entry.status = "pending";
		logger.info({ key }, "confirmation resubmitted after edit");
		return { success: true, data: snapshot(entry) };
	}

	/** Key of the requester's entry currently in Editing for this channel. */
	findEditing(requesterId: string, channelId: string): string | null {
		for (const entry of this.entries.values()) {
			if (
				entry.status === "editing" &&
				entry.requesterId === requesterId &&
				entry.channelId === channelId
			) {
				return entry.key;
			}
		}
		return null;
	}

	/** Remove a Confirmed entry once its post has been attempted. */
	complete(key: string): boolean {
		const entry = this.entries.get(key);
		if (!entry || entry.status !== "confirmed") return false;
		this.entries.delete(key);
		return true;
	}

	/** Any non-terminal state → Cancelled (removed immediately). */
	cancel(key: string): boolean {
		const entry = this.entries.get(key);
		if (!entry) return false;
		if (entry.status !== "pending" && entry.status !== "editing") return false;
		entry.status = "cancelled";
		this.entries.delete(key);
		logger.info({ key }, "confirmation cancelled");
		return true;
	}

	/**
	 * Remove Pending entries past their expiry. Entries in any other state are
	 * left alone. Returns the number removed.
	 */
	sweep(): number {
		const now = this.now();
		let removed = 0;
		for (const [key, entry] of this.entries) {
			if (entry.status === "pending" && now > entry.expiresAt) {
				entry.status = "expired";
				this.entries.delete(key);
				removed++;
			}
		}
		if (removed > 0) {
			logger.info({ removed }, "expired confirmations swept");
		}
		return removed;
	}

	start(): void {
		if (this.sweepTimer) return;
		this.sweepTimer = setInterval(() => {
			this.sweep();
		}, this.options.sweepIntervalMs);
		this.sweepTimer.unref();
		logger.debug({ intervalMs: this.options.sweepIntervalMs }, "confirmation sweep started");
	}

	stop(): void {
		if (!this.sweepTimer) return;
		clearInterval(this.sweepTimer);
		this.sweepTimer = null;
		logger.debug("confirmation sweep stopped");
	}

	stats(): ConfirmationRegistryStats {
		let pending = 0;
		let editing = 0;
		for (const entry of this.entries.values()) {
			if (entry.status === "pending") pending++;
			else if (entry.status === "editing") editing++;
		}
		return { total: this.entries.size, pending, editing, sweepRunning: this.sweepTimer !== null };
	}

	/** Length and media-count limits shared by create, resubmit and direct posts. */
	checkContent(text: string, media: readonly MediaRef[]): ValidationFailedError | null {
		const length = codePointLength(text);
		if (length > this.options.maxTextLength) {
			return new ValidationFailedError(
				`Text is ${length} characters; the limit is ${this.options.maxTextLength}.`,
			);
		}
		if (media.length > this.options.maxMediaItems) {
			return new ValidationFailedError(
				`${media.length} media items attached; the limit is ${this.options.maxMediaItems}.`,
			);
		}
		return null;
	}
}

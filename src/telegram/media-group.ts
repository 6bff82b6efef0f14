import type { MediaRef } from "../confirmation/types.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "telegram-media-group" });

/** One message of a Telegram album. */
export type MediaGroupItem = {
	groupId: string;
	userId: number | string;
	chatId: number | string;
	messageId: number | string;
	caption?: string;
	media: MediaRef;
};

/** A whole album, handed on once no more parts arrive. */
export type MediaGroupBatch = {
	groupId: string;
	userId: number | string;
	chatId: number | string;
	/** Id of the first part, used as the origin of the pending post */
	messageId: number | string;
	/** First non-empty caption of the album */
	text: string;
	media: MediaRef[];
};

type PendingGroup = {
	items: MediaGroupItem[];
	timer: ReturnType<typeof setTimeout>;
};

/**
 * Telegram delivers an album as separate messages sharing a media_group_id.
 * Collects the parts and flushes them as one batch after `delayMs` of quiet.
 */
export class MediaGroupCollector {
	private readonly groups = new Map<string, PendingGroup>();

	constructor(
		private readonly delayMs: number,
		private readonly onBatch: (batch: MediaGroupBatch) => Promise<void>,
	) {}

	get pendingCount(): number {
		return this.groups.size;
	}

	add(item: MediaGroupItem): void {
		const existing = this.groups.get(item.groupId);
		if (existing) clearTimeout(existing.timer);
		const items = existing ? [...existing.items, item] : [item];
		const timer = setTimeout(() => this.flush(item.groupId), this.delayMs);
		timer.unref();
		this.groups.set(item.groupId, { items, timer });
	}

	/** Drop every album still being collected. */
	clear(): void {
		for (const group of this.groups.values()) {
			clearTimeout(group.timer);
		}
		this.groups.clear();
	}

	private flush(groupId: string): void {
		const group = this.groups.get(groupId);
		if (!group) return;
		this.groups.delete(groupId);

		const [first] = group.items;
		if (!first) return;
		const caption = group.items.find((item) => item.caption?.trim())?.caption ?? "";
		const batch: MediaGroupBatch = {
			groupId,
			userId: first.userId,
			chatId: first.chatId,
			messageId: first.messageId,
			text: caption,
			media: group.items.map((item) => item.media),
		};
		logger.debug({ groupId, parts: batch.media.length }, "media group collected");
		this.onBatch(batch).catch((err) => {
			logger.error({ groupId, error: formatErrorSafe(err) }, "handling media group failed");
		});
	}
}

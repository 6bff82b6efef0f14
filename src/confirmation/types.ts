export type PendingPostStatus = "pending" | "editing" | "confirmed" | "cancelled" | "expired";

/**
 * Who asked for the post, where, and in reply to which message.
 * Telegram IDs are normalized to strings.
 */
export type PendingPostIdentity = {
	requesterId: string;
	channelId: string;
	originMessageId: string;
};

/**
 * A Telegram image attached to a pending post: a compressed photo or an
 * image sent as a file. Downloaded only at post time.
 */
export type MediaRef = {
	kind: "photo" | "document";
	fileId: string;
	mimeType?: string;
};

export type PendingPost = PendingPostIdentity & {
	key: string;
	text: string;
	media: readonly MediaRef[];
	createdAt: number;
	expiresAt: number;
	status: PendingPostStatus;
};

export function confirmationKey(identity: PendingPostIdentity): string {
	return `${identity.requesterId}_${identity.channelId}_${identity.originMessageId}`;
}

export function toIdentity(
	requesterId: string | number,
	channelId: string | number,
	originMessageId: string | number,
): PendingPostIdentity {
	return {
		requesterId: String(requesterId),
		channelId: String(channelId),
		originMessageId: String(originMessageId),
	};
}

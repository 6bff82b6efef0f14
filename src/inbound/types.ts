export type InboundMedia = {
	/** photo, video, animated_gif... as reported by X */
	type: string;
	url?: string;
};

export type InboundSender = {
	username?: string;
	name?: string;
};

/** One direct message received on X. */
export type InboundMessage = {
	id: string;
	text: string;
	senderId: string;
	/** ISO-8601 creation time, when X reports one. */
	timestamp?: string;
	media: InboundMedia[];
	sender?: InboundSender;
};

export type FetchInbound = (pageSize: number) => Promise<InboundMessage[]>;

/**
 * Send a forwarded message to the target chat, text first, then attachments.
 * Resolves false when the text was not delivered.
 */
export type DeliverToChat = (text: string, media?: readonly InboundMedia[]) => Promise<boolean>;

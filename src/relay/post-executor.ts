import type { PostExecutor } from "../confirmation/workflow.js";
import type { XClient } from "../social/x-client.js";
import type { PhotoFetcher } from "../telegram/delivery.js";

const DEFAULT_PHOTO_MIME = "image/jpeg";

/**
 * Publish a post: fetch each attached Telegram photo, upload it to X, then
 * create the post referencing the uploaded media.
 */
export function createPostExecutor(
	x: Pick<XClient, "createPost" | "uploadMedia">,
	fetchPhoto: PhotoFetcher,
): PostExecutor {
	return async (text, media) => {
		const mediaIds: string[] = [];
		for (const item of media) {
			const bytes = await fetchPhoto(item.fileId);
			mediaIds.push(await x.uploadMedia(bytes, item.mimeType ?? DEFAULT_PHOTO_MIME));
		}
		return x.createPost(text, mediaIds);
	};
}

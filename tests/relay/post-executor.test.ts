import { describe, expect, it, vi } from "vitest";

import { createPostExecutor } from "../../src/relay/post-executor.js";
import type { XClient } from "../../src/social/x-client.js";

describe("createPostExecutor", () => {
	it("uploads each photo before creating the post", async () => {
		const uploadMedia = vi.fn<XClient["uploadMedia"]>(async (_bytes, mimeType) => `media-${mimeType}`);
		const createPost = vi.fn<XClient["createPost"]>(async () => ({ id: "1", url: "https://x.com/i/web/status/1" }));
		const fetchPhoto = vi.fn(async (fileId: string) => new TextEncoder().encode(fileId));

		const receipt = await createPostExecutor({ uploadMedia, createPost }, fetchPhoto)("caption", [
			{ kind: "photo", fileId: "a" },
			{ kind: "photo", fileId: "b", mimeType: "image/png" },
		]);

		expect(receipt).toEqual({ id: "1", url: "https://x.com/i/web/status/1" });
		expect(fetchPhoto.mock.calls).toEqual([["a"], ["b"]]);
		expect(uploadMedia.mock.calls.map((call) => call[1])).toEqual(["image/jpeg", "image/png"]);
		expect(createPost).toHaveBeenCalledWith("caption", ["media-image/jpeg", "media-image/png"]);
	});

	it("creates a text-only post without touching media", async () => {
		const uploadMedia = vi.fn<XClient["uploadMedia"]>();
		const createPost = vi.fn<XClient["createPost"]>(async () => ({ id: "2", url: "u" }));

		await createPostExecutor({ uploadMedia, createPost }, vi.fn())("just text", []);

		expect(uploadMedia).not.toHaveBeenCalled();
		expect(createPost).toHaveBeenCalledWith("just text", []);
	});
});

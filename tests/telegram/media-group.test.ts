import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { type MediaGroupBatch, MediaGroupCollector } from "../../src/telegram/media-group.js";

function part(messageId: number, caption?: string, groupId = "album-1") {
	return {
		groupId,
		userId: 111,
		chatId: 222,
		messageId,
		caption,
		media: { kind: "photo" as const, fileId: `photo-${messageId}` },
	};
}

describe("MediaGroupCollector", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("hands on an album once the parts stop arriving", async () => {
		const batches: MediaGroupBatch[] = [];
		const collector = new MediaGroupCollector(1000, async (batch) => {
			batches.push(batch);
		});

		collector.add(part(10));
		await vi.advanceTimersByTimeAsync(600);
		collector.add(part(11, "  "));
		collector.add(part(12, "sunset"));
		collector.add(part(13, "ignored"));
		await vi.advanceTimersByTimeAsync(999);
		expect(batches).toEqual([]);

		await vi.advanceTimersByTimeAsync(1);
		expect(batches).toEqual([
			{
				groupId: "album-1",
				userId: 111,
				chatId: 222,
				messageId: 10,
				text: "sunset",
				media: [
					{ kind: "photo", fileId: "photo-10" },
					{ kind: "photo", fileId: "photo-11" },
					{ kind: "photo", fileId: "photo-12" },
					{ kind: "photo", fileId: "photo-13" },
				],
			},
		]);
		expect(collector.pendingCount).toBe(0);
	});

	it("keeps separate albums apart", async () => {
		const batches: MediaGroupBatch[] = [];
		const collector = new MediaGroupCollector(1000, async (batch) => {
			batches.push(batch);
		});

		collector.add(part(1, "one", "a"));
		collector.add(part(2, "two", "b"));
		await vi.advanceTimersByTimeAsync(1000);

		expect(batches.map((batch) => [batch.groupId, batch.text, batch.media.length])).toEqual([
			["a", "one", 1],
			["b", "two", 1],
		]);
	});

	it("drops albums still being collected on clear", async () => {
		const onBatch = vi.fn(async (_batch: MediaGroupBatch) => {});
		const collector = new MediaGroupCollector(1000, onBatch);

		collector.add(part(1));
		collector.clear();
		await vi.advanceTimersByTimeAsync(1000);

		expect(onBatch).not.toHaveBeenCalled();
		expect(collector.pendingCount).toBe(0);
	});

	it("survives a failing batch handler", async () => {
		const onBatch = vi.fn(async (_batch: MediaGroupBatch) => {
			throw new Error("chat not found");
		});
		const collector = new MediaGroupCollector(1000, onBatch);

		collector.add(part(1));
		await vi.advanceTimersByTimeAsync(1000);

		expect(onBatch).toHaveBeenCalledTimes(1);
		expect(collector.pendingCount).toBe(0);
	});
});

import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { ConfirmationRegistry } from "../../src/confirmation/registry.js";
import { confirmationKey, type MediaRef, toIdentity } from "../../src/confirmation/types.js";

const OPTIONS = {
	timeoutMs: 300_000,
	sweepIntervalMs: 60_000,
	maxTextLength: 280,
	maxMediaItems: 4,
};

const identity = toIdentity(111, -100200, 7);
const photo: MediaRef = { kind: "photo", fileId: "file-1" };

function createRegistry() {
	let clock = 1_000_000;
	const registry = new ConfirmationRegistry(OPTIONS, { now: () => clock });
	return {
		registry,
		advance: (ms: number) => {
			clock += ms;
		},
	};
}

function createKey(registry: ConfirmationRegistry, text = "hello world"): string {
	const result = registry.create(identity, text);
	if (!result.success) throw result.error;
	return result.data;
}

describe("ConfirmationRegistry", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("derives the key from requester, channel and origin message", () => {
		expect(confirmationKey(identity)).toBe("111_-100200_7");
	});

	it("creates a pending entry with an expiry", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);

		expect(key).toBe("111_-100200_7");
		expect(registry.get(key)).toMatchObject({
			requesterId: "111",
			channelId: "-100200",
			originMessageId: "7",
			text: "hello world",
			status: "pending",
			createdAt: 1_000_000,
			expiresAt: 1_300_000,
		});
	});

	it("rejects text over the limit by code points", () => {
		const { registry } = createRegistry();
		// 281 code points, 562 UTF-16 units
		const result = registry.create(identity, "😀".repeat(281));

		expect(result.success).toBe(false);
		if (result.success) return;
		expect(result.error.kind).toBe("validation_failed");
		expect(result.error.message).toBe("Text is 281 characters; the limit is 280.");
		expect(registry.stats().total).toBe(0);
	});

	it("accepts text at the limit when counted by code points", () => {
		const { registry } = createRegistry();
		expect(registry.create(identity, "😀".repeat(280)).success).toBe(true);
	});

	it("rejects too many media items", () => {
		const { registry } = createRegistry();
		const result = registry.create(identity, "pics", [photo, photo, photo, photo, photo]);

		expect(result.success).toBe(false);
		if (result.success) return;
		expect(result.error.message).toBe("5 media items attached; the limit is 4.");
	});

	it("confirms a pending entry exactly once", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);

		expect(registry.confirm(key)?.status).toBe("confirmed");
		expect(registry.confirm(key)).toBeNull();
	});

	it("refuses to confirm after expiry and removes the entry", () => {
		const { registry, advance } = createRegistry();
		const key = createKey(registry);

		advance(300_000);
		expect(registry.isExpired(key)).toBe(false);
		advance(1);
		expect(registry.isExpired(key)).toBe(true);
		expect(registry.confirm(key)).toBeNull();
		expect(registry.get(key)).toBeNull();
	});

	it("treats unknown keys as expired", () => {
		const { registry } = createRegistry();
		expect(registry.isExpired("nope")).toBe(true);
		expect(registry.confirm("nope")).toBeNull();
	});

	it("returns snapshots that callers cannot mutate", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);
		const snapshot = registry.get(key);

		expect(Object.isFrozen(snapshot)).toBe(true);
		expect(registry.get(key)).not.toBe(snapshot);
	});

	it("moves through edit and resubmit with a fresh expiry", () => {
		const { registry, advance } = createRegistry();
		const key = createKey(registry);

		expect(registry.setEditing(key)).toBe(true);
		expect(registry.setEditing(key)).toBe(false);
		expect(registry.confirm(key)).toBeNull();
		expect(registry.findEditing("111", "-100200")).toBe(key);
		expect(registry.findEditing("111", "other")).toBeNull();

		advance(100_000);
		const result = registry.resubmit(key, "edited text", [photo]);
		expect(result?.success).toBe(true);
		expect(registry.get(key)).toMatchObject({
			text: "edited text",
			media: [photo],
			status: "pending",
			createdAt: 1_100_000,
			expiresAt: 1_400_000,
		});
	});

	it("keeps existing media when resubmitting text only", () => {
		const { registry } = createRegistry();
		const created = registry.create(identity, "with photo", [photo]);
		if (!created.success) throw created.error;
		registry.setEditing(created.data);

		registry.resubmit(created.data, "new caption");

		expect(registry.get(created.data)?.media).toEqual([photo]);
	});

	it("only resubmits entries in editing", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);

		expect(registry.resubmit(key, "x")).toBeNull();
		expect(registry.resubmit("missing", "x")).toBeNull();
	});

	it("leaves an editing entry untouched when the new text is invalid", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);
		registry.setEditing(key);

		const result = registry.resubmit(key, "a".repeat(281));

		expect(result?.success).toBe(false);
		expect(registry.get(key)).toMatchObject({ status: "editing", text: "hello world" });
	});

	it("completes only confirmed entries", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);

		expect(registry.complete(key)).toBe(false);
		registry.confirm(key);
		expect(registry.complete(key)).toBe(true);
		expect(registry.get(key)).toBeNull();
	});

	it("cancels pending or editing entries but not confirmed ones", () => {
		const { registry } = createRegistry();
		const key = createKey(registry);
		expect(registry.cancel(key)).toBe(true);
		expect(registry.cancel(key)).toBe(false);

		const again = createKey(registry);
		registry.confirm(again);
		expect(registry.cancel(again)).toBe(false);
	});

	it("sweeps only expired pending entries", () => {
		const { registry, advance } = createRegistry();
		const pending = createKey(registry);
		const editingResult = registry.create(toIdentity(111, -100200, 8), "being edited");
		const confirmedResult = registry.create(toIdentity(111, -100200, 9), "posting");
		if (!editingResult.success || !confirmedResult.success) throw new Error("setup failed");
		registry.setEditing(editingResult.data);
		registry.confirm(confirmedResult.data);

		advance(300_001);

		expect(registry.sweep()).toBe(1);
		expect(registry.get(pending)).toBeNull();
		expect(registry.get(editingResult.data)?.status).toBe("editing");
		expect(registry.get(confirmedResult.data)?.status).toBe("confirmed");
	});

	it("runs the sweep on an interval and can be stopped", () => {
		vi.useFakeTimers();
		vi.setSystemTime(0);
		const registry = new ConfirmationRegistry({ ...OPTIONS, timeoutMs: 1000, sweepIntervalMs: 5000 });
		registry.create(identity, "short lived");

		registry.start();
		registry.start();
		expect(registry.stats()).toEqual({ total: 1, pending: 1, editing: 0, sweepRunning: true });

		vi.advanceTimersByTime(5000);
		expect(registry.stats().total).toBe(0);

		registry.stop();
		registry.stop();
		expect(registry.stats().sweepRunning).toBe(false);
	});
});

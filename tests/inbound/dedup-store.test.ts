import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { DedupStore } from "../../src/inbound/dedup-store.js";

const NOW = Date.parse("2026-03-01T00:00:00.000Z");
const DAY = 24 * 60 * 60 * 1000;

describe("DedupStore", () => {
	let dir: string;
	let filePath: string;
	let clock: number;
	const now = () => clock;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "postgate-dedup-"));
		filePath = path.join(dir, "processed-dm-ids.json");
		clock = NOW;
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	function open(maxAgeDays = 7): DedupStore {
		return new DedupStore({ filePath, maxAgeDays }, { now });
	}

	function readFile(): { version: number; updatedAt: string; records: Record<string, string> } {
		return JSON.parse(fs.readFileSync(filePath, "utf8"));
	}

	it("starts empty when no file exists and does not create one", () => {
		const store = open();

		expect(store.count()).toBe(0);
		expect(store.isProcessed("dm-1")).toBe(false);
		expect(fs.existsSync(filePath)).toBe(false);
	});

	it("writes every insert through to disk", () => {
		const store = open();

		expect(store.markProcessed("dm-1")).toBe(true);

		expect(readFile()).toEqual({
			version: 1,
			updatedAt: "2026-03-01T00:00:00.000Z",
			records: { "dm-1": "2026-03-01T00:00:00.000Z" },
		});
		expect(fs.existsSync(`${filePath}.tmp`)).toBe(false);
		expect(fs.statSync(filePath).mode & 0o777).toBe(0o600);
	});

	it("treats a repeated insert as a no-op", () => {
		const store = open();
		store.markProcessed("dm-1");
		clock += 1000;

		expect(store.markProcessed("dm-1")).toBe(false);
		expect(readFile().updatedAt).toBe("2026-03-01T00:00:00.000Z");
	});

	it("survives a restart", () => {
		open().markProcessed("dm-1");
		open().markProcessed("dm-2");

		const reopened = open();
		expect(reopened.isProcessed("dm-1")).toBe(true);
		expect(reopened.isProcessed("dm-2")).toBe(true);
		expect(reopened.count()).toBe(2);
	});

	it("drops records past the retention window on load", () => {
		fs.writeFileSync(
			filePath,
			JSON.stringify({
				version: 1,
				records: {
					old: new Date(NOW - 8 * DAY).toISOString(),
					fresh: new Date(NOW - 1 * DAY).toISOString(),
				},
			}),
		);

		const store = open();

		expect(store.isProcessed("old")).toBe(false);
		expect(store.isProcessed("fresh")).toBe(true);
		expect(Object.keys(readFile().records)).toEqual(["fresh"]);
	});

	it("compacts on demand", () => {
		const store = open();
		store.markProcessed("a");
		clock += 3 * DAY;
		store.markProcessed("b");
		clock += 5 * DAY;

		expect(store.compact()).toBe(1);
		expect(store.isProcessed("a")).toBe(false);
		expect(store.isProcessed("b")).toBe(true);
		expect(store.compact()).toBe(0);
	});

	it("upgrades a legacy processed_ids map", () => {
		fs.writeFileSync(
			filePath,
			JSON.stringify({ processed_ids: { "dm-9": "2026-02-28T12:00:00.000Z", "dm-10": "not a date" } }),
		);

		const store = open();

		expect(store.count()).toBe(2);
		expect(readFile().records).toEqual({
			"dm-9": "2026-02-28T12:00:00.000Z",
			"dm-10": "2026-03-01T00:00:00.000Z",
		});
	});

	it("upgrades a legacy processed_ids list", () => {
		fs.writeFileSync(filePath, JSON.stringify({ processed_ids: ["dm-1", 42] }));

		const store = open();

		expect(store.isProcessed("dm-1")).toBe(true);
		expect(store.isProcessed("42")).toBe(true);
		expect(readFile().version).toBe(1);
	});

	it("upgrades a bare id array", () => {
		fs.writeFileSync(filePath, JSON.stringify(["x1", "x2"]));

		const store = open();

		expect(store.count()).toBe(2);
		expect(readFile().records).toEqual({
			x1: "2026-03-01T00:00:00.000Z",
			x2: "2026-03-01T00:00:00.000Z",
		});
	});

	it("quarantines an unreadable file and starts empty", () => {
		fs.writeFileSync(filePath, "{not json");

		const store = open();

		expect(store.count()).toBe(0);
		expect(fs.existsSync(filePath)).toBe(false);
		expect(fs.readFileSync(`${filePath}.corrupted.${NOW}`, "utf8")).toBe("{not json");
	});

	it("quarantines a file with an unknown layout", () => {
		fs.writeFileSync(filePath, JSON.stringify({ something: "else" }));

		open();

		expect(fs.existsSync(`${filePath}.corrupted.${NOW}`)).toBe(true);
	});

	it("reports stats", () => {
		const store = open(3);
		expect(store.stats()).toEqual({ count: 0, filePath, maxAgeDays: 3, oldest: null, newest: null });

		store.markProcessed("a");
		clock += DAY;
		store.markProcessed("b");

		expect(store.stats()).toEqual({
			count: 2,
			filePath,
			maxAgeDays: 3,
			oldest: "2026-03-01T00:00:00.000Z",
			newest: "2026-03-02T00:00:00.000Z",
		});
	});
});

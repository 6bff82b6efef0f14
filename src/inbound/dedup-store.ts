import { chmodSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import path from "node:path";

import { z } from "zod";

import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "dedup-store" });

const DAY_MS = 24 * 60 * 60 * 1000;

export type DedupStoreOptions = {
	filePath: string;
	maxAgeDays: number;
};

export type DedupStoreStats = {
	count: number;
	filePath: string;
	maxAgeDays: number;
	oldest: string | null;
	newest: string | null;
};

const StoreFileSchema = z.object({
	version: z.number().optional(),
	updatedAt: z.string().optional(),
	records: z.record(z.unknown()),
});

// Earlier deployments wrote either a bare id list or a `processed_ids` map/list
const LegacyListSchema = z.array(z.union([z.string(), z.number()]));
const LegacyMapFileSchema = z.object({
	processed_ids: z.union([z.record(z.unknown()), LegacyListSchema]),
});

type LoadedRecords = {
	records: Map<string, number>;
	/** true when the on-disk layout or content should be rewritten */
	dirty: boolean;
};

/**
 * Durable set of inbound message IDs that were already forwarded.
 *
 * Every insert is written through to disk (temp file + rename). Records older
 * than `maxAgeDays` are dropped on load and by compact().
 */
export class DedupStore {
	private readonly records: Map<string, number>;
	private readonly now: () => number;

	constructor(
		private readonly options: DedupStoreOptions,
		deps: { now?: () => number } = {},
	) {
		this.now = deps.now ?? Date.now;
		const loaded = this.load();
		this.records = loaded.records;

		const dropped = this.dropExpired();
		if (loaded.dirty || dropped > 0) {
			try {
				this.persist();
			} catch (err) {
				// Contents are intact in memory; the next insert retries the write
				logger.warn(
					{ filePath: this.options.filePath, error: String(err) },
					"failed to rewrite dedup store after load",
				);
			}
		}
		logger.info(
			{ filePath: this.options.filePath, count: this.records.size, dropped },
			"dedup store loaded",
		);
	}

	isProcessed(id: string): boolean {
		return this.records.has(id);
	}

	/**
	 * Record an ID as forwarded and persist. Already-present IDs are a no-op
	 * (returns false, no rewrite). Throws if the write fails; the ID stays
	 * marked in memory either way.
	 */
	markProcessed(id: string): boolean {
		if (this.records.has(id)) return false;
		this.records.set(id, this.now());
		this.persist();
		return true;
	}

	count(): number {
		return this.records.size;
	}

	/** Drop records past the retention window. Returns how many were removed. */
	compact(): number {
		const removed = this.dropExpired();
		if (removed > 0) {
			this.persist();
			logger.info({ removed, remaining: this.records.size }, "dedup store compacted");
		}
		return removed;
	}

	stats(): DedupStoreStats {
		let oldest: number | null = null;
		let newest: number | null = null;
		for (const seenAt of this.records.values()) {
			if (oldest === null || seenAt < oldest) oldest = seenAt;
			if (newest === null || seenAt > newest) newest = seenAt;
		}
		return {
			count: this.records.size,
			filePath: this.options.filePath,
			maxAgeDays: this.options.maxAgeDays,
			oldest: oldest === null ? null : new Date(oldest).toISOString(),
			newest: newest === null ? null : new Date(newest).toISOString(),
		};
	}

	private dropExpired(): number {
		const cutoff = this.now() - this.options.maxAgeDays * DAY_MS;
		let removed = 0;
		for (const [id, seenAt] of this.records) {
			if (seenAt < cutoff) {
				this.records.delete(id);
				removed++;
			}
		}
		return removed;
	}

	private load(): LoadedRecords {
		const { filePath } = this.options;
		if (!existsSync(filePath)) {
			return { records: new Map(), dirty: false };
		}

		try {
			const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
			const loaded = this.parse(raw);
			if (!loaded) throw new Error("unrecognized dedup store layout");
			return loaded;
		} catch (err) {
			// Quarantine the unreadable file for manual inspection, start empty
			const backupPath = `${filePath}.corrupted.${this.now()}`;
			try {
				renameSync(filePath, backupPath);
			} catch (renameErr) {
				logger.error(
					{ filePath, error: String(err), renameError: String(renameErr) },
					"dedup store corrupted and backup failed",
				);
				throw new Error(`Dedup store corrupted: ${String(err)}. Manual recovery required.`);
			}
			logger.error(
				{ filePath, backupPath, error: String(err) },
				"dedup store corrupted, moved to backup - starting empty",
			);
			return { records: new Map(), dirty: false };
		}
	}

	private parse(raw: unknown): LoadedRecords | null {
		const current = StoreFileSchema.safeParse(raw);
		if (current.success) {
			const records = this.fromMap(current.data.records);
			return { records: records.map, dirty: records.restamped || current.data.version !== 1 };
		}

		const legacy = LegacyMapFileSchema.safeParse(raw);
		if (legacy.success) {
			const ids = legacy.data.processed_ids;
			const records = Array.isArray(ids) ? this.fromList(ids) : this.fromMap(ids).map;
			return { records, dirty: true };
		}

		const list = LegacyListSchema.safeParse(raw);
		if (list.success) {
			return { records: this.fromList(list.data), dirty: true };
		}

		return null;
	}

	private fromList(ids: ReadonlyArray<string | number>): Map<string, number> {
		const loadedAt = this.now();
		return new Map(ids.map((id) => [String(id), loadedAt]));
	}

	/** Unparseable timestamps are kept and restamped with the load time. */
	private fromMap(entries: Record<string, unknown>): { map: Map<string, number>; restamped: boolean } {
		const loadedAt = this.now();
		const map = new Map<string, number>();
		let restamped = false;
		for (const [id, value] of Object.entries(entries)) {
			const parsed = typeof value === "string" ? Date.parse(value) : Number.NaN;
			if (Number.isNaN(parsed)) {
				restamped = true;
				map.set(id, loadedAt);
			} else {
				map.set(id, parsed);
			}
		}
		return { map, restamped };
	}

	private persist(): void {
		const { filePath } = this.options;
		mkdirSync(path.dirname(filePath), { recursive: true, mode: 0o700 });

		const records: Record<string, string> = {};
		for (const [id, seenAt] of this.records) {
			records[id] = new Date(seenAt).toISOString();
		}
		const content = JSON.stringify(
			{ version: 1, updatedAt: new Date(this.now()).toISOString(), records },
			null,
			2,
		);

		// Atomic write: temp file, then rename over the real one
		const tempPath = `${filePath}.tmp`;
		writeFileSync(tempPath, content, { mode: 0o600 });
		chmodSync(tempPath, 0o600);
		renameSync(tempPath, filePath);
	}
}

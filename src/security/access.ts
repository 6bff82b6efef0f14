import { AuthorizationDeniedError } from "../infra/errors.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "access" });

/**
 * Allow-list of Telegram user IDs permitted to submit posts and run commands.
 *
 * SECURITY: an empty list authorizes nobody.
 */
export class AccessControl {
	private readonly allowed: ReadonlySet<string>;

	constructor(userIds: ReadonlyArray<string | number>) {
		this.allowed = new Set(userIds.map((id) => String(id)));
		if (this.allowed.size === 0) {
			logger.warn("no authorized Telegram users configured; every request will be denied");
		}
	}

	isAuthorized(userId: string | number | undefined): boolean {
		if (userId === undefined) return false;
		return this.allowed.has(String(userId));
	}

	/** Throws AuthorizationDeniedError for anyone not on the list. */
	assertAuthorized(userId: string | number | undefined): void {
		if (this.isAuthorized(userId)) return;
		const id = userId === undefined ? "unknown" : String(userId);
		logger.warn({ userId: id }, "unauthorized access attempt");
		throw new AuthorizationDeniedError(id);
	}

	get size(): number {
		return this.allowed.size;
	}
}

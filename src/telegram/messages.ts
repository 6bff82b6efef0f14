import type { PendingPost } from "../confirmation/types.js";
import type { ConfirmationRegistryStats } from "../confirmation/registry.js";
import type { MetricsSnapshot } from "../health/metrics.js";
import type { DedupStoreStats } from "../inbound/dedup-store.js";
import type { InboundPollerStatus, PollSummary } from "../inbound/poller.js";
import type { RelayError } from "../infra/errors.js";

export const HELP_TEXT = [
	"Send me a message (or up to 4 photos or image files with a caption) and I'll ask you to confirm before posting it to X.",
	"",
	"Buttons: ✅ Post publishes, ✏️ Edit lets you send replacement text, ❌ Cancel drops it.",
	"Unconfirmed posts expire automatically.",
	"",
	"Commands:",
	"/status - relay status",
	"/dm_status - X direct message forwarding status",
	"/dm_check - check for new X direct messages now",
	"/help - this message",
].join("\n");

function formatMinutes(ms: number): string {
	const minutes = Math.round(ms / 60_000);
	if (minutes >= 1) return `${minutes} min`;
	return `${Math.max(1, Math.round(ms / 1000))} s`;
}

export function renderPreview(post: PendingPost, now: number): string {
	const lines = ["Post this to X?", "", post.text || "[no text]"];
	if (post.media.length > 0) {
		lines.push("", `📎 ${post.media.length} photo(s) attached`);
	}
	lines.push("", `Expires in ${formatMinutes(Math.max(0, post.expiresAt - now))}.`);
	return lines.join("\n");
}

export function renderPosted(url: string, dryRun: boolean): string {
	return dryRun ? `✅ Dry run: post accepted but not published (${url})` : `✅ Posted: ${url}`;
}

/** User-facing explanation of a failure, one line. */
export function describeError(error: RelayError): string {
	switch (error.kind) {
		case "rate_limited":
			return "X is rate limiting us. Try again in a few minutes.";
		case "non_retriable":
			return "X rejected the post. Check the content and credentials.";
		case "transient_failure":
			return "Could not reach X. Try again shortly.";
		case "authorization_denied":
			return "You are not authorized to use this bot.";
		case "validation_failed":
			return error.message;
		case "state_conflict":
			return "This post is no longer awaiting a decision.";
		case "forward_failed":
			return "Forwarding failed.";
	}
}

export function renderPostFailed(error: RelayError, attempt = 1): string {
	const tries = attempt > 1 ? ` (attempt ${attempt})` : "";
	return `⚠️ Post failed${tries}: ${describeError(error)}`;
}

export const EXPIRED_TEXT = "⌛ This confirmation expired. Send the message again to start over.";
export const NOT_FOUND_TEXT = "This post is no longer pending.";
export const CANCELLED_TEXT = "❌ Cancelled.";
export const EDIT_PROMPT_TEXT = "✏️ Send the replacement text (or photo with caption).";

export function renderPollerStatus(status: InboundPollerStatus, dedup: DedupStoreStats): string {
	const state = !status.enabled ? "disabled" : status.running ? "running" : "stopped";
	const lines = [
		`DM forwarding: ${state}`,
		`Poll interval: ${Math.round(status.pollIntervalMs / 1000)} s`,
		`Forwarded this session: ${status.processedCount}`,
		`Last poll: ${status.lastPollAt ?? "never"}`,
		`Remembered message IDs: ${dedup.count}`,
	];
	if (status.lastError) {
		lines.push(`Last error: ${status.lastError}`);
	}
	if (status.consecutiveFetchFailures > 0) {
		lines.push(`Consecutive fetch failures: ${status.consecutiveFetchFailures}`);
	}
	return lines.join("\n");
}

export function renderPollSummary(summary: PollSummary): string {
	if (summary.fetched === 0) return "No direct messages found.";
	return `Checked ${summary.fetched} message(s): ${summary.forwarded} forwarded, ${summary.skipped} already seen, ${summary.failed} failed.`;
}

export function renderRelayStatus(input: {
	registry: ConfirmationRegistryStats;
	metrics: MetricsSnapshot;
	poller: InboundPollerStatus;
	confirmationEnabled: boolean;
	dryRun: boolean;
}): string {
	const { registry, metrics, poller } = input;
	return [
		`Mode: ${input.dryRun ? "dry run" : "live"}`,
		`Confirmation: ${input.confirmationEnabled ? "on" : "off"}`,
		`Pending: ${registry.pending}, editing: ${registry.editing}`,
		`Posts sent: ${metrics.posts.sent}, failed: ${metrics.posts.failed}`,
		`DMs forwarded: ${metrics.inbound.forwarded}, failed: ${metrics.inbound.failed}`,
		`DM forwarding: ${poller.enabled ? (poller.running ? "running" : "stopped") : "disabled"}`,
		`Uptime: ${metrics.uptimeSeconds} s`,
	].join("\n");
}

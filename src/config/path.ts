import path from "node:path";
import { CONFIG_DIR } from "../utils.js";

let override: string | null = null;

/** `--config`, then POSTGATE_CONFIG, then postgate.json in the data dir. */
export function resolveConfigPath(): string {
	return override ?? (process.env.POSTGATE_CONFIG || path.join(CONFIG_DIR, "postgate.json"));
}

export function setConfigPath(configPath: string | null): void {
	override = configPath;
}

export function resetConfigPath(): void {
	override = null;
}

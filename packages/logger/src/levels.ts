import type { LevelWithSilent } from "pino";

const LEVELS = new Set<string>(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function isLevel(value: string): value is LevelWithSilent {
	return LEVELS.has(value);
}

export function parseLogLevel(value: string | undefined): LevelWithSilent | null {
	if (!value) return null;
	const normalized = value.trim().toLowerCase();
	return isLevel(normalized) ? normalized : null;
}

/**
 * Pretty output is for local runs: never in production or under test,
 * and `LOG_PRETTY=false` turns it off anywhere.
 */
export function prettyByDefault(env: NodeJS.ProcessEnv = process.env): boolean {
	if (env.NODE_ENV === "production" || env.NODE_ENV === "test") return false;
	return env.LOG_PRETTY !== "false" && env.LOG_PRETTY !== "0";
}

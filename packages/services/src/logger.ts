import { type Logger, createLogger } from "@guildhand/logger";

let current: Logger | undefined;

/** Replaces the root every service derives its module logger from. */
export function setServicesLogger(logger: Logger): void {
	current = logger;
}

/** The injected logger, or a default one created on first use. */
export function getServicesLogger(): Logger {
	current ??= createLogger({ service: "services" });
	return current;
}

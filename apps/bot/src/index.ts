/**
 * Bot Entry Point
 *
 * Wires translator, confirmation and execution to a Discord client and starts
 * the status server.
 */

import { getEnvStatus } from "@guildhand/environment";
import { createLogger } from "@guildhand/logger";
import { confirmation, executor, inference, pending, translator } from "@guildhand/services";
import { setServicesLogger } from "@guildhand/services/logger";
import { Events } from "discord.js";
import { createDiscordClient, readBotStatus, registerCommands } from "./discord/client";
import { DiscordGuildAccess } from "./discord/guild-access";
import { InteractionHandler } from "./discord/interactions";
import { loadBotEnv } from "./lib/env";
import { createStatusServer } from "./server";

const SWEEP_INTERVAL_MS = 60_000;
const SHUTDOWN_TIMEOUT_MS = 5000;

const logger = createLogger({ service: "bot" });
setServicesLogger(logger.child({ layer: "services" }));

async function start(): Promise<void> {
	const status = getEnvStatus();
	if (status.missing.length > 0) {
		logger.warn(
			{ missing: status.missing.map((item) => item.key) },
			"Missing required environment variables",
		);
	}

	const env = loadBotEnv();

	const store = new pending.InMemoryPendingActionStore();
	const coordinator = new confirmation.ConfirmationCoordinator({
		store,
		executor: new executor.ActionExecutor(),
		confirmationTtlMs: env.confirmationTimeoutMs,
	});
	const instructionTranslator = new translator.InstructionTranslator({
		infer: inference.createHuggingFaceInference({
			token: env.huggingFaceToken,
			modelUrl: env.modelUrl,
			maxNewTokens: env.maxNewTokens,
		}),
		timeoutMs: env.inferenceTimeoutMs,
	});

	const client = createDiscordClient();
	const handler = new InteractionHandler({
		translator: instructionTranslator,
		coordinator,
		createAccess: (guild) => new DiscordGuildAccess(guild),
		confirmationTimeoutMs: env.confirmationTimeoutMs,
		logger,
	});

	client.on(Events.InteractionCreate, (interaction) => {
		handler.handle(interaction).catch((err: unknown) => {
			logger.error({ err }, "Unhandled interaction error");
		});
	});
	client.once(Events.ClientReady, (readyClient) => {
		logger.info({ user: readyClient.user.tag, guilds: readyClient.guilds.cache.size }, "Bot ready");
		registerCommands(readyClient, env.guildId)
			.then((count) => {
				logger.info({ count, guildId: env.guildId ?? "global" }, "Slash commands registered");
			})
			.catch((err: unknown) => {
				logger.error({ err }, "Failed to register slash commands");
			});
	});

	// Drops expired entries whose prompt timer never ran
	const sweeper = setInterval(() => {
		const removed = store.sweepExpired();
		if (removed > 0) {
			logger.debug({ count: removed }, "Swept expired confirmations");
		}
	}, SWEEP_INTERVAL_MS);
	sweeper.unref();

	const { server } = createStatusServer({ logger, getStatus: () => readBotStatus(client) });
	server.listen(env.statusPort, () => {
		logger.info({ port: env.statusPort }, "Status server listening");
	});

	await client.login(env.discordToken);

	// Graceful shutdown: stop timers, disconnect, close server.
	let shutdownPromise: Promise<void> | null = null;
	const shutdown = async () => {
		if (shutdownPromise) return shutdownPromise;
		shutdownPromise = (async () => {
			logger.info("Shutting down");
			const forceExit = setTimeout(() => {
				logger.warn("Shutdown timeout, forcing exit");
				process.exit(0);
			}, SHUTDOWN_TIMEOUT_MS);
			forceExit.unref();

			clearInterval(sweeper);
			handler.dispose();
			await client.destroy();
			await new Promise<void>((resolve) => server.close(() => resolve()));

			clearTimeout(forceExit);
		})();
		return shutdownPromise;
	};
	process.once("SIGTERM", () => {
		shutdown().catch((err: unknown) => {
			logger.error({ err }, "Shutdown failed");
		});
	});
	process.once("SIGINT", () => {
		shutdown().catch((err: unknown) => {
			logger.error({ err }, "Shutdown failed");
		});
	});
}

start().catch((err) => {
	logger.fatal({ err }, "Failed to start bot");
	process.exit(1);
});

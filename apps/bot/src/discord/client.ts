import { Client, GatewayIntentBits } from "discord.js";
import type { BotStatus } from "../api";
import { commandDefinitions } from "./commands";

export function createDiscordClient(): Client {
	return new Client({
		// Members intent is needed to resolve members by name
		intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMembers],
	});
}

/**
 * Register the slash commands; guild-scoped registration is visible immediately.
 * Returns how many commands were registered.
 */
export async function registerCommands(client: Client<true>, guildId?: string): Promise<number> {
	const registered = guildId
		? await client.application.commands.set(commandDefinitions, guildId)
		: await client.application.commands.set(commandDefinitions);
	return registered.size;
}

export function readBotStatus(client: Client): BotStatus | null {
	if (!client.isReady()) return null;
	return {
		status: "online",
		user: client.user.tag,
		guilds: client.guilds.cache.size,
		latencyMs: client.ws.ping,
		uptimeSeconds: Math.round(client.uptime / 1000),
	};
}

export interface EnvRequirement {
	key: string;
	reason: string;
	secret?: boolean;
}

export interface EnvStatus {
	features: {
		guildScopedCommands: boolean;
		prettyLogs: boolean;
	};
	missing: EnvRequirement[];
}

const isSet = (value: string | undefined) => value !== undefined && value !== "";

export function getEnvStatus(env: NodeJS.ProcessEnv = process.env): EnvStatus {
	const missing: EnvRequirement[] = [];

	const requireKey = (key: string, reason: string, secret = false) => {
		if (!isSet(env[key])) {
			missing.push({ key, reason, secret });
		}
	};

	requireKey("DISCORD_TOKEN", "Discord bot token", true);
	requireKey("HUGGINGFACE_TOKEN", "Hugging Face inference API token", true);

	return {
		features: {
			guildScopedCommands: isSet(env.DISCORD_GUILD_ID),
			prettyLogs: env.NODE_ENV !== "production" && env.LOG_PRETTY !== "false",
		},
		missing,
	};
}

import { env } from "@guildhand/environment/server";

const SECOND_MS = 1000;

export interface BotEnv {
	discordToken: string;
	/** Register commands on this guild only; global registration otherwise */
	guildId?: string;
	huggingFaceToken: string;
	modelUrl: string;
	maxNewTokens: number;
	inferenceTimeoutMs: number;
	confirmationTimeoutMs: number;
	statusPort: number;
}

export function loadBotEnv(): BotEnv {
	return {
		discordToken: env.DISCORD_TOKEN,
		guildId: env.DISCORD_GUILD_ID || undefined,
		huggingFaceToken: env.HUGGINGFACE_TOKEN,
		modelUrl: env.HUGGINGFACE_MODEL_URL,
		maxNewTokens: env.INFERENCE_MAX_NEW_TOKENS,
		inferenceTimeoutMs: env.INFERENCE_TIMEOUT_SECONDS * SECOND_MS,
		confirmationTimeoutMs: env.CONFIRMATION_TIMEOUT_SECONDS * SECOND_MS,
		statusPort: env.STATUS_PORT,
	};
}

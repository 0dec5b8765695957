import { z } from "zod";

const requiredString = z.string().min(1);
// Treat empty strings as undefined for optional env vars
const optionalString = z
	.string()
	.optional()
	.transform((val) => (val === "" ? undefined : val));
const optionalBoolean = z
	.enum(["true", "false", "1", "0"])
	.default("false")
	.transform((value) => value === "true" || value === "1");
const optionalPort = (defaultPort: number) =>
	z.coerce.number().int().positive().default(defaultPort);
const optionalSeconds = (defaultSeconds: number) =>
	z.coerce.number().int().positive().default(defaultSeconds);

const optionalLogLevel = optionalString
	.transform((value) => value?.toLowerCase())
	.refine(
		(value) =>
			value === undefined ||
			value === "trace" ||
			value === "debug" ||
			value === "info" ||
			value === "warn" ||
			value === "error" ||
			value === "fatal" ||
			value === "silent",
		{ message: "Must be one of: trace, debug, info, warn, error, fatal, silent" },
	);

export const DEFAULT_HUGGINGFACE_MODEL_URL =
	"https://api-inference.huggingface.co/models/mistralai/Mistral-7B-Instruct-v0.1";

// Discord snowflakes are 17-20 digit integers
const optionalSnowflake = optionalString.refine((val) => val === undefined || /^\d{17,20}$/.test(val), {
	message: "Must be a Discord snowflake id",
});

export const serverSchema = {
	NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
	DISCORD_TOKEN: requiredString,
	DISCORD_GUILD_ID: optionalSnowflake, // Register slash commands on one guild (instant) instead of globally
	HUGGINGFACE_TOKEN: requiredString,
	HUGGINGFACE_MODEL_URL: z.string().url().default(DEFAULT_HUGGINGFACE_MODEL_URL),
	INFERENCE_TIMEOUT_SECONDS: optionalSeconds(20),
	INFERENCE_MAX_NEW_TOKENS: z.coerce.number().int().min(16).max(4096).default(800),
	CONFIRMATION_TIMEOUT_SECONDS: optionalSeconds(120),
	STATUS_PORT: optionalPort(5000),
	LOG_LEVEL: optionalLogLevel,
	LOG_PRETTY: optionalBoolean,
	SKIP_ENV_VALIDATION: optionalBoolean,
} as const;

export type ServerSchema = typeof serverSchema;

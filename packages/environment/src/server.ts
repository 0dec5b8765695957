import { createEnv } from "@t3-oss/env-core";
import { DEFAULT_HUGGINGFACE_MODEL_URL, serverSchema } from "./schema";

const rawEnv = createEnv({
	server: serverSchema,
	runtimeEnv: process.env,
	skipValidation: process.env.SKIP_ENV_VALIDATION === "true",
	emptyStringAsUndefined: true,
	onValidationError: (issues) => {
		const details = issues
			.map((issue) => `  ${issue.path?.join(".") || "unknown"}: ${issue.message}`)
			.join("\n");
		const message = `Invalid environment variables:\n${details}`;
		console.error(message);
		throw new Error(message);
	},
});

// With SKIP_ENV_VALIDATION=true, @t3-oss/env-core hands back the raw runtime env (strings)
// without applying schema defaults. Normalize the fields read at runtime.
const normalizeInt = (value: unknown, fallback: number) => {
	if (typeof value === "number" && Number.isFinite(value)) return value;
	if (typeof value === "string" && value.trim() !== "") {
		const parsed = Number(value);
		if (Number.isFinite(parsed) && parsed > 0) return Math.trunc(parsed);
	}
	return fallback;
};

const normalizeString = (value: unknown, fallback: string) =>
	typeof value === "string" && value.trim() !== "" ? value.trim() : fallback;

const normalizeBoolean = (value: unknown, fallback = false) => {
	if (value === true || value === "true" || value === "1") return true;
	if (value === false || value === "false" || value === "0") return false;
	return fallback;
};

export const env = new Proxy(rawEnv, {
	get(target, prop, receiver) {
		const value: unknown = Reflect.get(target, prop, receiver);
		if (prop === "INFERENCE_TIMEOUT_SECONDS") return normalizeInt(value, 20);
		if (prop === "INFERENCE_MAX_NEW_TOKENS") return normalizeInt(value, 800);
		if (prop === "CONFIRMATION_TIMEOUT_SECONDS") return normalizeInt(value, 120);
		if (prop === "STATUS_PORT") return normalizeInt(value, 5000);
		if (prop === "HUGGINGFACE_MODEL_URL") return normalizeString(value, DEFAULT_HUGGINGFACE_MODEL_URL);
		if (prop === "LOG_PRETTY") return normalizeBoolean(value);
		return value;
	},
});

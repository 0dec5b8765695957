/**
 * Hugging Face Inference API client.
 *
 * Formats the request for instruction-tuned Mistral/Llama models and returns
 * the generated text. Non-2xx responses and transport failures throw; the
 * translator turns both into an "AI unavailable" result.
 */

import { getServicesLogger } from "../logger";
import { type InferenceClient, InferenceError } from "./types";

const DEFAULT_MAX_NEW_TOKENS = 800;
const DEFAULT_TEMPERATURE = 0.1;
const MAX_ERROR_BODY = 200;

export interface HuggingFaceInferenceOptions {
	token: string;
	modelUrl: string;
	maxNewTokens?: number;
	temperature?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Wrap the system prompt and instruction in the [INST] chat template.
 */
export function buildInstructPrompt(systemPrompt: string, instruction: string): string {
	return `<s>[INST] ${systemPrompt}\n\nINSTRUCTION: ${instruction} [/INST]`;
}

/**
 * Pull the generated text out of an inference response body.
 * Text-generation endpoints answer `[{ generated_text }]`; anything else is stringified.
 */
export function extractGeneratedText(data: unknown): string {
	if (Array.isArray(data) && data.length > 0) {
		const first: unknown = data[0];
		if (isRecord(first) && typeof first.generated_text === "string") {
			return first.generated_text;
		}
	}
	if (isRecord(data) && typeof data.generated_text === "string") {
		return data.generated_text;
	}
	if (typeof data === "string") {
		return data;
	}
	return JSON.stringify(data);
}

export function createHuggingFaceInference(options: HuggingFaceInferenceOptions): InferenceClient {
	return async ({ systemPrompt, instruction, timeoutMs, signal }) => {
		const logger = getServicesLogger().child({ module: "inference" });
		const startMs = Date.now();

		const response = await fetch(options.modelUrl, {
			method: "POST",
			headers: {
				Authorization: `Bearer ${options.token}`,
				"Content-Type": "application/json",
			},
			body: JSON.stringify({
				inputs: buildInstructPrompt(systemPrompt, instruction),
				parameters: {
					max_new_tokens: options.maxNewTokens ?? DEFAULT_MAX_NEW_TOKENS,
					temperature: options.temperature ?? DEFAULT_TEMPERATURE,
					do_sample: true,
					return_full_text: false,
				},
			}),
			// Bounded on its own too, for callers that never abort
			signal: AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]),
		});

		if (!response.ok) {
			const body = await response.text().catch(() => "");
			logger.error(
				{ status: response.status, error: body.slice(0, MAX_ERROR_BODY) },
				"Hugging Face API error",
			);
			throw new InferenceError(
				`Hugging Face API error ${response.status}: ${body.slice(0, MAX_ERROR_BODY)}`,
				response.status,
			);
		}

		const data: unknown = await response.json();
		const text = extractGeneratedText(data).trim();
		logger.debug({ durationMs: Date.now() - startMs, length: text.length }, "Model responded");
		return text;
	};
}

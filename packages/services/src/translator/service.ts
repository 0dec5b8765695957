/**
 * Instruction translator.
 *
 * Natural-language instruction in, validated ActionList (or a typed error)
 * out. Either the whole list validates or nothing is returned.
 */

import { type Action, type ActionList, describeValidationFailure, parseAction } from "@guildhand/actions";
import { withDeadline } from "../inference/deadline";
import { DeadlineExceededError, type InferenceClient } from "../inference/types";
import { getServicesLogger } from "../logger";
import { extractJsonArray } from "./extract";
import { buildSystemPrompt } from "./prompt";

export const DEFAULT_INFERENCE_TIMEOUT_MS = 20_000;
const RAW_EXCERPT_LENGTH = 1500;

// ============================================
// Types
// ============================================

export type TranslationError =
	| { code: "inference_unavailable"; message: string }
	| { code: "malformed_response"; raw: string }
	| { code: "invalid_action"; index: number; reason: string }
	| { code: "unknown_action_kind"; index: number; kind: string }
	| { code: "no_actions" };

export type TranslationResult =
	| { ok: true; actions: ActionList }
	| { ok: false; error: TranslationError };

export interface InstructionTranslatorOptions {
	infer: InferenceClient;
	timeoutMs?: number;
	systemPrompt?: string;
}

// ============================================
// Projection
// ============================================

/**
 * Validate every element of a parsed array. The first failing element fails the whole list.
 */
export function projectActions(elements: unknown[]): TranslationResult {
	if (elements.length === 0) {
		return { ok: false, error: { code: "no_actions" } };
	}

	const actions: Action[] = [];
	for (const [index, element] of elements.entries()) {
		const result = parseAction(element);
		if (result.ok) {
			actions.push(result.action);
			continue;
		}
		if (result.code === "unknown_action_kind") {
			return { ok: false, error: { code: "unknown_action_kind", index, kind: result.kind } };
		}
		return {
			ok: false,
			error: { code: "invalid_action", index, reason: describeValidationFailure(result) },
		};
	}

	return { ok: true, actions: Object.freeze(actions) };
}

/**
 * Turn raw model output into an ActionList. Deterministic for the same text.
 */
export function interpretModelOutput(text: string): TranslationResult {
	const elements = extractJsonArray(text);
	if (!elements) {
		return {
			ok: false,
			error: { code: "malformed_response", raw: text.slice(0, RAW_EXCERPT_LENGTH) },
		};
	}
	return projectActions(elements);
}

// ============================================
// Translator
// ============================================

export class InstructionTranslator {
	private readonly infer: InferenceClient;
	private readonly timeoutMs: number;
	private readonly systemPrompt: string;

	constructor(options: InstructionTranslatorOptions) {
		this.infer = options.infer;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_INFERENCE_TIMEOUT_MS;
		this.systemPrompt = options.systemPrompt ?? buildSystemPrompt();
	}

	async translate(instruction: string): Promise<TranslationResult> {
		const log = getServicesLogger().child({ module: "translator" });
		const startMs = Date.now();

		let text: string;
		try {
			text = await withDeadline(
				(signal) =>
					this.infer({
						systemPrompt: this.systemPrompt,
						instruction,
						timeoutMs: this.timeoutMs,
						signal,
					}),
				this.timeoutMs,
			);
		} catch (err) {
			if (err instanceof DeadlineExceededError) {
				log.warn({ timeoutMs: this.timeoutMs }, "Inference timed out");
			} else {
				log.warn({ err }, "Inference failed");
			}
			const message = err instanceof Error ? err.message : String(err);
			return { ok: false, error: { code: "inference_unavailable", message } };
		}

		const result = interpretModelOutput(text);
		if (result.ok) {
			log.info(
				{ count: result.actions.length, durationMs: Date.now() - startMs },
				"Instruction translated",
			);
		} else {
			log.info({ code: result.error.code, durationMs: Date.now() - startMs }, "Translation rejected");
		}
		return result;
	}
}

export { extractJsonArray, findClosingBracket } from "./extract";
export { buildSystemPrompt } from "./prompt";
export {
	DEFAULT_INFERENCE_TIMEOUT_MS,
	InstructionTranslator,
	type InstructionTranslatorOptions,
	interpretModelOutput,
	projectActions,
	type TranslationError,
	type TranslationResult,
} from "./service";

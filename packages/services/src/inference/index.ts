export * from "./types";
export { withDeadline } from "./deadline";
export {
	buildInstructPrompt,
	createHuggingFaceInference,
	extractGeneratedText,
	type HuggingFaceInferenceOptions,
} from "./huggingface";

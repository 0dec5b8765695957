export {
	describeTranslationError,
	formatOutcomeLine,
	formatOutcomeSummary,
	formatPlan,
	INFERENCE_UNAVAILABLE_MESSAGE,
	NOT_FOUND_MESSAGE,
	type OutcomeSummary,
} from "./format";

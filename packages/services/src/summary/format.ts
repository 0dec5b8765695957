/**
 * Requester-facing text for plans, outcomes and translation failures.
 */

import { type ActionList, describeAction, isDestructive } from "@guildhand/actions";
import type { ActionOutcome } from "../executor/types";
import type { TranslationError } from "../translator/service";

export const NOT_FOUND_MESSAGE = "No such pending action.";
export const INFERENCE_UNAVAILABLE_MESSAGE = "AI unavailable, try again.";

const RAW_PREVIEW_LENGTH = 500;

export interface OutcomeSummary {
	header: string;
	lines: string[];
	text: string;
}

export function formatOutcomeLine(outcome: ActionOutcome): string {
	const description = describeAction(outcome.action);
	if (outcome.succeeded) {
		return `✅ ${description} (${outcome.resultRef.id})`;
	}
	return `❌ ${description}: ${outcome.errorReason}`;
}

export function formatOutcomeSummary(outcomes: readonly ActionOutcome[]): OutcomeSummary {
	const succeeded = outcomes.filter((outcome) => outcome.succeeded).length;
	const failed = outcomes.length - succeeded;
	const header = `Executed ${outcomes.length} action(s): ${succeeded} succeeded, ${failed} failed`;
	const lines = outcomes.map(formatOutcomeLine);
	return { header, lines, text: [header, ...lines].join("\n") };
}

/** Numbered plan; destructive steps are flagged. */
export function formatPlan(actions: ActionList): string {
	return actions
		.map((action, index) => {
			const flag = isDestructive(action.kind) ? " ⚠️" : "";
			return `${index + 1}. ${describeAction(action)}${flag}`;
		})
		.join("\n");
}

export function describeTranslationError(error: TranslationError): string {
	switch (error.code) {
		case "inference_unavailable":
			return INFERENCE_UNAVAILABLE_MESSAGE;
		case "malformed_response":
			return [
				"Could not read a list of actions from the AI response. Try rephrasing.",
				"```",
				error.raw.slice(0, RAW_PREVIEW_LENGTH),
				"```",
			].join("\n");
		case "invalid_action":
			return `Action ${error.index + 1} is invalid: ${error.reason}`;
		case "unknown_action_kind":
			return `Action ${error.index + 1} is not supported: "${error.kind}"`;
		case "no_actions":
			return "AI returned no actions to perform.";
	}
}

import { type Action, validate } from "@guildhand/actions";
import { describe, expect, it } from "vitest";
import type { ActionOutcome } from "../executor/types";
import { describeTranslationError, formatOutcomeSummary, formatPlan } from "./format";

function action(kind: string, fields: unknown): Action {
	const result = validate(kind, fields);
	if (!result.ok) throw new Error(`Invalid fixture: ${kind}`);
	return result.action;
}

describe("formatOutcomeSummary", () => {
	it("counts successes and failures and lists every outcome", () => {
		const outcomes: ActionOutcome[] = [
			{
				action: action("create_role", { target: "Mods" }),
				succeeded: true,
				resultRef: { id: "100", name: "Mods", type: "role" },
				durationMs: 3,
			},
			{
				action: action("delete_channel", { target: "missing" }),
				succeeded: false,
				errorReason: "channel not found: missing",
				durationMs: 1,
			},
		];

		const summary = formatOutcomeSummary(outcomes);

		expect(summary.header).toBe("Executed 2 action(s): 1 succeeded, 1 failed");
		expect(summary.lines).toEqual([
			'✅ Create role "Mods" (100)',
			'❌ Delete channel "missing": channel not found: missing',
		]);
		expect(summary.text).toBe(
			[
				"Executed 2 action(s): 1 succeeded, 1 failed",
				'✅ Create role "Mods" (100)',
				'❌ Delete channel "missing": channel not found: missing',
			].join("\n"),
		);
	});
});

describe("formatPlan", () => {
	it("numbers the steps and flags destructive ones", () => {
		expect(
			formatPlan([
				action("lock_channel", { target: "general" }),
				action("delete_role", { target: "Guests" }),
			]),
		).toBe('1. Lock channel "general"\n2. Delete role "Guests" ⚠️');
	});
});

describe("describeTranslationError", () => {
	it("reports an unavailable model without details", () => {
		expect(describeTranslationError({ code: "inference_unavailable", message: "503" })).toBe(
			"AI unavailable, try again.",
		);
	});

	it("uses one-based positions for invalid actions", () => {
		expect(
			describeTranslationError({ code: "unknown_action_kind", index: 1, kind: "ban_everyone" }),
		).toBe('Action 2 is not supported: "ban_everyone"');
		expect(
			describeTranslationError({ code: "invalid_action", index: 0, reason: "Expected an object" }),
		).toBe("Action 1 is invalid: Expected an object");
	});

	it("quotes the raw response when it could not be read", () => {
		expect(describeTranslationError({ code: "malformed_response", raw: "I cannot help" })).toBe(
			"Could not read a list of actions from the AI response. Try rephrasing.\n```\nI cannot help\n```",
		);
	});

	it("explains an empty list", () => {
		expect(describeTranslationError({ code: "no_actions" })).toBe(
			"AI returned no actions to perform.",
		);
	});
});

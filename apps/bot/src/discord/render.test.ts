import { type Action, validate } from "@guildhand/actions";
import type { executor } from "@guildhand/services";
import { ButtonStyle } from "discord.js";
import { describe, expect, it } from "vitest";
import {
	buildConfirmationRow,
	buildCustomId,
	buildPlanEmbed,
	buildSummaryEmbed,
	parseCustomId,
} from "./render";

function action(kind: string, fields: unknown): Action {
	const result = validate(kind, fields);
	if (!result.ok) throw new Error(`Invalid fixture: ${kind}`);
	return result.action;
}

const created: executor.ActionOutcome = {
	action: action("create_category", { target: "Gaming" }),
	succeeded: true,
	resultRef: { id: "100", name: "Gaming", type: "category" },
	durationMs: 4,
};

const failed: executor.ActionOutcome = {
	action: action("delete_role", { target: "Guests" }),
	succeeded: false,
	errorReason: "Role not found: Guests",
	durationMs: 2,
};

describe("custom ids", () => {
	it("carries the decision and token", () => {
		expect(buildCustomId("confirm", "tok-1")).toBe("guildhand:confirm:tok-1");
		expect(parseCustomId("guildhand:cancel:tok-1")).toEqual({ decision: "cancel", token: "tok-1" });
	});

	it("ignores ids that are not ours", () => {
		expect(parseCustomId("other:confirm:tok-1")).toBeNull();
		expect(parseCustomId("guildhand:approve:tok-1")).toBeNull();
		expect(parseCustomId("guildhand:confirm:")).toBeNull();
	});
});

describe("buildConfirmationRow", () => {
	it("offers confirm and cancel buttons for the token", () => {
		expect(buildConfirmationRow("tok-1").toJSON()).toMatchObject({
			components: [
				{ custom_id: "guildhand:confirm:tok-1", label: "Confirm", style: ButtonStyle.Danger, disabled: false },
				{ custom_id: "guildhand:cancel:tok-1", label: "Cancel", style: ButtonStyle.Secondary, disabled: false },
			],
		});
	});

	it("can render disabled buttons", () => {
		const row = buildConfirmationRow("tok-1", true).toJSON();
		expect(row.components.map((button) => button.disabled)).toEqual([true, true]);
	});
});

describe("buildPlanEmbed", () => {
	it("lists the plan and the timeout", () => {
		const embed = buildPlanEmbed(
			{
				token: "tok-1",
				requesterId: "u1",
				summary: '1. Delete role "Guests" ⚠️',
				actions: [failed.action],
				expiresAt: null,
			},
			120,
		);

		expect(embed.data.title).toBe("Confirm admin actions");
		expect(embed.data.description).toBe('1. Delete role "Guests" ⚠️');
		expect(embed.data.footer?.text).toBe("Only the requester can confirm. Expires in 120 seconds.");
	});
});

describe("buildSummaryEmbed", () => {
	it("uses the outcome summary as title and lines", () => {
		const embed = buildSummaryEmbed([created, failed]);

		expect(embed.data.title).toBe("Executed 2 action(s): 1 succeeded, 1 failed");
		expect(embed.data.description).toBe(
			'✅ Create category "Gaming" (100)\n❌ Delete role "Guests": Role not found: Guests',
		);
		expect(embed.data.color).toBe(0xf1c40f);
	});

	it("colors full success and full failure differently", () => {
		expect(buildSummaryEmbed([created]).data.color).toBe(0x2ecc71);
		expect(buildSummaryEmbed([failed]).data.color).toBe(0xe74c3c);
	});
});

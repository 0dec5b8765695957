import { ApplicationCommandOptionType } from "discord.js";
import { describe, expect, it } from "vitest";
import { buildDirectAction, commandDefinitions, readOptions } from "./commands";

const CHANNEL_ID = "111111111111111111";
const ROLE_ID = "222222222222222222";
const USER_ID = "333333333333333333";

describe("commandDefinitions", () => {
	it("registers the AI command and every direct command", () => {
		expect(commandDefinitions.map((command) => command.name)).toEqual([
			"server_ai",
			"create_role",
			"create_channel",
			"delete_channel",
			"assign_role",
			"remove_role",
			"lock_channel",
			"unlock_channel",
			"create_category",
			"channel_permissions",
		]);
	});
});

describe("readOptions", () => {
	it("keeps options that carry a value", () => {
		expect(
			readOptions([
				{ name: "name", type: ApplicationCommandOptionType.String, value: "Mods" },
				{ name: "send_messages", type: ApplicationCommandOptionType.Boolean, value: false },
				{ name: "empty", type: ApplicationCommandOptionType.String },
			]),
		).toEqual({ name: "Mods", send_messages: false });
	});
});

describe("buildDirectAction", () => {
	it("builds a role with a normalized color", () => {
		expect(buildDirectAction("create_role", { name: "Mods", color: "FF0000" })).toEqual({
			ok: true,
			action: { kind: "create_role", target: "Mods", params: { color: "#ff0000" } },
		});
	});

	it("defaults new channels to text", () => {
		expect(buildDirectAction("create_channel", { name: "general" })).toEqual({
			ok: true,
			action: { kind: "create_channel", target: "general", params: { type: "text" } },
		});
	});

	it("targets picked channels, users and roles by mention", () => {
		expect(buildDirectAction("delete_channel", { channel: CHANNEL_ID })).toEqual({
			ok: true,
			action: { kind: "delete_channel", target: `<#${CHANNEL_ID}>`, params: {} },
		});
		expect(buildDirectAction("assign_role", { user: USER_ID, role: ROLE_ID })).toEqual({
			ok: true,
			action: { kind: "assign_role", target: `<@${USER_ID}>`, params: { role: `<@&${ROLE_ID}>` } },
		});
	});

	it("collects permission toggles for a role", () => {
		expect(
			buildDirectAction("channel_permissions", {
				channel: CHANNEL_ID,
				role: ROLE_ID,
				send_messages: false,
				view_channel: true,
			}),
		).toEqual({
			ok: true,
			action: {
				kind: "set_channel_permissions",
				target: `<#${CHANNEL_ID}>`,
				params: {
					subject: `<@&${ROLE_ID}>`,
					subjectType: "role",
					permissions: { send_messages: false, view_channel: true },
				},
			},
		});
	});

	it("requires exactly one permission subject", () => {
		expect(
			buildDirectAction("channel_permissions", {
				channel: CHANNEL_ID,
				role: ROLE_ID,
				user: USER_ID,
				speak: true,
			}),
		).toEqual({ ok: false, message: "Specify either a role or a user, not both." });
		expect(buildDirectAction("channel_permissions", { channel: CHANNEL_ID, speak: true })).toEqual({
			ok: false,
			message: "Specify a role or a user.",
		});
	});

	it("rejects a permission command without changes", () => {
		expect(buildDirectAction("channel_permissions", { channel: CHANNEL_ID, user: USER_ID })).toEqual({
			ok: false,
			message: "No permission changes specified.",
		});
	});

	it("reports validation failures", () => {
		expect(buildDirectAction("create_role", { name: "Mods", color: "red" })).toEqual({
			ok: false,
			message: "create_role: params.color: Must be a 6-digit hex color such as #ff0000",
		});
	});

	it("rejects unknown commands", () => {
		expect(buildDirectAction("nuke_server", {})).toEqual({
			ok: false,
			message: "Unknown command: nuke_server",
		});
	});
});

/**
 * Slash command definitions and the mapping from direct commands to actions.
 */

import { type Action, describeValidationFailure, validate } from "@guildhand/actions";
import {
	type CommandInteractionOption,
	PermissionFlagsBits,
	type RESTPostAPIChatInputApplicationCommandsJSONBody,
	SlashCommandBuilder,
} from "discord.js";
import { mention } from "./references";

export const SERVER_AI_COMMAND = "server_ai";

// ============================================
// Definitions
// ============================================

const adminCommand = (name: string, description: string) =>
	new SlashCommandBuilder()
		.setName(name)
		.setDescription(description)
		.setDMPermission(false)
		.setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild);

export const commandDefinitions: RESTPostAPIChatInputApplicationCommandsJSONBody[] = [
	adminCommand(SERVER_AI_COMMAND, "Describe admin changes in plain language")
		.addStringOption((option) =>
			option
				.setName("instruction")
				.setDescription("e.g. create a category Gaming with a voice channel Lobby")
				.setRequired(true),
		)
		.toJSON(),
	adminCommand("create_role", "Create a new role")
		.addStringOption((option) =>
			option.setName("name").setDescription("Role name").setRequired(true),
		)
		.addStringOption((option) =>
			option.setName("color").setDescription("Hex color such as #ff0000"),
		)
		.toJSON(),
	adminCommand("create_channel", "Create a text or voice channel")
		.addStringOption((option) =>
			option.setName("name").setDescription("Channel name").setRequired(true),
		)
		.addStringOption((option) =>
			option
				.setName("channel_type")
				.setDescription("Channel type")
				.addChoices({ name: "text", value: "text" }, { name: "voice", value: "voice" }),
		)
		.addStringOption((option) =>
			option.setName("category").setDescription("Category name; created when missing"),
		)
		.toJSON(),
	adminCommand("delete_channel", "Delete a channel (asks for confirmation)")
		.addChannelOption((option) =>
			option.setName("channel").setDescription("Channel to delete").setRequired(true),
		)
		.toJSON(),
	adminCommand("assign_role", "Give a role to a member")
		.addUserOption((option) => option.setName("user").setDescription("Member").setRequired(true))
		.addRoleOption((option) => option.setName("role").setDescription("Role").setRequired(true))
		.toJSON(),
	adminCommand("remove_role", "Take a role away from a member")
		.addUserOption((option) => option.setName("user").setDescription("Member").setRequired(true))
		.addRoleOption((option) => option.setName("role").setDescription("Role").setRequired(true))
		.toJSON(),
	adminCommand("lock_channel", "Lock a text channel for @everyone")
		.addChannelOption((option) =>
			option.setName("channel").setDescription("Text channel").setRequired(true),
		)
		.toJSON(),
	adminCommand("unlock_channel", "Unlock a text channel for @everyone")
		.addChannelOption((option) =>
			option.setName("channel").setDescription("Text channel").setRequired(true),
		)
		.toJSON(),
	adminCommand("create_category", "Create a channel category")
		.addStringOption((option) =>
			option.setName("name").setDescription("Category name").setRequired(true),
		)
		.toJSON(),
	adminCommand("channel_permissions", "Set channel permissions for a role or user")
		.addChannelOption((option) =>
			option.setName("channel").setDescription("Channel").setRequired(true),
		)
		.addRoleOption((option) => option.setName("role").setDescription("Role to change"))
		.addUserOption((option) => option.setName("user").setDescription("User to change"))
		.addBooleanOption((option) =>
			option.setName("send_messages").setDescription("Allow/deny sending messages"),
		)
		.addBooleanOption((option) =>
			option.setName("view_channel").setDescription("Allow/deny viewing the channel"),
		)
		.addBooleanOption((option) =>
			option.setName("manage_messages").setDescription("Allow/deny managing messages"),
		)
		.addBooleanOption((option) =>
			option.setName("connect").setDescription("Allow/deny connecting (voice)"),
		)
		.addBooleanOption((option) => option.setName("speak").setDescription("Allow/deny speaking (voice)"))
		.toJSON(),
];

// ============================================
// Direct commands
// ============================================

export type CommandOptionValues = Record<string, string | number | boolean>;

export type DirectCommandResult = { ok: true; action: Action } | { ok: false; message: string };

const TOGGLES = ["send_messages", "view_channel", "manage_messages", "connect", "speak"] as const;

export function readOptions(options: readonly CommandInteractionOption[]): CommandOptionValues {
	const values: CommandOptionValues = {};
	for (const option of options) {
		if (option.value !== undefined) {
			values[option.name] = option.value;
		}
	}
	return values;
}

function stringOption(values: CommandOptionValues, name: string): string | undefined {
	const value = values[name];
	return typeof value === "string" ? value : undefined;
}

function channelOption(values: CommandOptionValues): string | undefined {
	const id = stringOption(values, "channel");
	return id ? mention("channel", id) : undefined;
}

function fieldsFor(
	commandName: string,
	values: CommandOptionValues,
): { kind: string; fields: unknown } | { error: string } {
	switch (commandName) {
		case "create_role":
			return {
				kind: "create_role",
				fields: { target: stringOption(values, "name"), params: { color: stringOption(values, "color") } },
			};
		case "create_channel":
			return {
				kind: "create_channel",
				fields: {
					target: stringOption(values, "name"),
					params: {
						type: stringOption(values, "channel_type"),
						category: stringOption(values, "category"),
					},
				},
			};
		case "delete_channel":
		case "lock_channel":
		case "unlock_channel":
			return { kind: commandName, fields: { target: channelOption(values) } };
		case "assign_role":
		case "remove_role": {
			const user = stringOption(values, "user");
			const role = stringOption(values, "role");
			return {
				kind: commandName,
				fields: {
					target: user && mention("user", user),
					params: { role: role && mention("role", role) },
				},
			};
		}
		case "create_category":
			return { kind: "create_category", fields: { target: stringOption(values, "name") } };
		case "channel_permissions": {
			const role = stringOption(values, "role");
			const user = stringOption(values, "user");
			if (role && user) return { error: "Specify either a role or a user, not both." };
			if (!role && !user) return { error: "Specify a role or a user." };

			const permissions: Record<string, boolean> = {};
			for (const toggle of TOGGLES) {
				const value = values[toggle];
				if (typeof value === "boolean") permissions[toggle] = value;
			}
			if (Object.keys(permissions).length === 0) {
				return { error: "No permission changes specified." };
			}

			return {
				kind: "set_channel_permissions",
				fields: {
					target: channelOption(values),
					params: role
						? { subject: mention("role", role), subjectType: "role", permissions }
						: { subject: user && mention("user", user), subjectType: "user", permissions },
				},
			};
		}
		default:
			return { error: `Unknown command: ${commandName}` };
	}
}

/**
 * Build the single action a direct command stands for. Goes through the same
 * validation as model output.
 */
export function buildDirectAction(commandName: string, values: CommandOptionValues): DirectCommandResult {
	const mapped = fieldsFor(commandName, values);
	if ("error" in mapped) {
		return { ok: false, message: mapped.error };
	}

	const result = validate(mapped.kind, mapped.fields);
	if (!result.ok) {
		return { ok: false, message: describeValidationFailure(result) };
	}
	return { ok: true, action: result.action };
}

/**
 * Action definitions (Zod schemas).
 *
 * One entry per kind. `actionSchema` is the discriminated union every
 * validated Action conforms to.
 */

import { z } from "zod";
import {
	type ActionDefinition,
	type ActionKind,
	CHANNEL_PERMISSIONS,
	ROLE_PERMISSIONS,
} from "./types";

// ============================================
// Field schemas
// ============================================

/**
 * Name, id or mention. Models sometimes emit ids as bare numbers; snowflakes
 * past 2^53 have already been rounded by JSON.parse and are refused.
 */
export const reference = z
	.union([z.string(), z.number().int().nonnegative().safe("Ids must be quoted strings")])
	.transform((value) => String(value).trim())
	.pipe(z.string().min(1, "Must not be empty"));

const hexColor = z
	.string()
	.regex(/^#?[0-9a-fA-F]{6}$/, "Must be a 6-digit hex color such as #ff0000")
	.transform((value) => `#${value.replace(/^#/, "").toLowerCase()}`);

export const permissionMap = z
	.record(z.enum(CHANNEL_PERMISSIONS), z.boolean())
	.refine((value) => Object.keys(value).length > 0, {
		message: "At least one permission is required",
	});

const emptyParams = z.object({}).strict();

const createChannelParams = z
	.object({
		type: z.enum(["text", "voice"]).default("text").describe("Channel type"),
		category: reference.optional().describe("Category to place the channel in"),
		overwrites: z
			.record(z.string().min(1), permissionMap)
			.optional()
			.describe("Initial permission overwrites keyed by role name"),
	})
	.strict();

const createRoleParams = z
	.object({
		color: hexColor.optional().describe("Role color, e.g. #ff0000"),
		permissions: z
			.array(z.enum(ROLE_PERMISSIONS))
			.optional()
			.describe("Guild permissions granted to the role"),
	})
	.strict();

const memberRoleParams = z
	.object({
		role: reference.describe("Role name or id"),
	})
	.strict();

const channelPermissionParams = z
	.object({
		subject: reference.describe("Role or user the overwrite applies to"),
		subjectType: z
			.enum(["role", "user"])
			.optional()
			.describe("Whether subject is a role or a user; roles are tried first when absent"),
		permissions: permissionMap.describe("Permission name to allow (true) or deny (false)"),
	})
	.strict();

// ============================================
// Action schemas
// ============================================

const withParams = <K extends ActionKind, P extends z.ZodTypeAny>(kind: K, params: P) =>
	z.object({
		kind: z.literal(kind),
		target: reference,
		params,
	});

export const actionSchema = z.discriminatedUnion("kind", [
	withParams("create_channel", createChannelParams.default({})),
	withParams("delete_channel", emptyParams.default({})),
	withParams("create_role", createRoleParams.default({})),
	withParams("delete_role", emptyParams.default({})),
	withParams("assign_role", memberRoleParams),
	withParams("remove_role", memberRoleParams),
	withParams("lock_channel", emptyParams.default({})),
	withParams("unlock_channel", emptyParams.default({})),
	withParams("create_category", emptyParams.default({})),
	withParams("set_channel_permissions", channelPermissionParams),
]);

export type Action = z.output<typeof actionSchema>;
export type ActionList = readonly Action[];
export type ActionOf<K extends ActionKind> = Extract<Action, { kind: K }>;

// ============================================
// Catalog
// ============================================

export const actionDefinitions: ActionDefinition[] = [
	{
		kind: "create_channel",
		description: "Create a text or voice channel, optionally inside a category",
		target: "name of the new channel",
		riskLevel: "write",
		capability: "manage_channels",
		params: createChannelParams,
	},
	{
		kind: "delete_channel",
		description: "Delete a channel",
		target: "channel name, id or mention",
		riskLevel: "destructive",
		capability: "manage_channels",
		params: emptyParams,
	},
	{
		kind: "create_role",
		description: "Create a role with an optional color and permissions",
		target: "name of the new role",
		riskLevel: "write",
		capability: "manage_roles",
		params: createRoleParams,
	},
	{
		kind: "delete_role",
		description: "Delete a role",
		target: "role name, id or mention",
		riskLevel: "destructive",
		capability: "manage_roles",
		params: emptyParams,
	},
	{
		kind: "assign_role",
		description: "Give a role to a member",
		target: "member name, id or mention",
		riskLevel: "write",
		capability: "manage_roles",
		params: memberRoleParams,
	},
	{
		kind: "remove_role",
		description: "Take a role away from a member",
		target: "member name, id or mention",
		riskLevel: "write",
		capability: "manage_roles",
		params: memberRoleParams,
	},
	{
		kind: "lock_channel",
		description: "Stop @everyone from sending messages in a text channel",
		target: "channel name, id or mention",
		riskLevel: "write",
		capability: "manage_channels",
		params: emptyParams,
	},
	{
		kind: "unlock_channel",
		description: "Allow @everyone to send messages in a text channel again",
		target: "channel name, id or mention",
		riskLevel: "write",
		capability: "manage_channels",
		params: emptyParams,
	},
	{
		kind: "create_category",
		description: "Create a channel category",
		target: "name of the new category",
		riskLevel: "write",
		capability: "manage_channels",
		params: emptyParams,
	},
	{
		kind: "set_channel_permissions",
		description: "Set permission overwrites for a role or user on a channel",
		target: "channel name, id or mention",
		riskLevel: "write",
		capability: "manage_channels",
		params: channelPermissionParams,
	},
];

const definitionsByKind = new Map<string, ActionDefinition>(
	actionDefinitions.map((definition) => [definition.kind, definition]),
);

export function getActionDefinition(kind: string): ActionDefinition | undefined {
	return definitionsByKind.get(kind);
}

export function listActionDefinitions(): ActionDefinition[] {
	return [...actionDefinitions];
}

export function isActionKind(kind: string): kind is ActionKind {
	return definitionsByKind.has(kind);
}

export function isDestructive(kind: ActionKind): boolean {
	return definitionsByKind.get(kind)?.riskLevel === "destructive";
}

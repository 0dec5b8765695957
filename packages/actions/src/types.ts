/**
 * The closed administrative action vocabulary.
 *
 * Everything the bot can do to a guild is one of these kinds. The set is fixed:
 * a model response naming any other kind is rejected, never dropped.
 */

import type { z } from "zod";

// ============================================
// Vocabulary
// ============================================

export const ACTION_KINDS = [
	"create_channel",
	"delete_channel",
	"create_role",
	"delete_role",
	"assign_role",
	"remove_role",
	"lock_channel",
	"unlock_channel",
	"create_category",
	"set_channel_permissions",
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/**
 * Risk classification for the confirmation flow.
 * Any destructive action in a list gates the whole list behind confirmation.
 */
export type RiskLevel = "write" | "destructive";

/** Guild capabilities a requester may hold. */
export type GuildCapability = "administrator" | "manage_guild" | "manage_channels" | "manage_roles";

/** Channel permission names accepted in permission maps. */
export const CHANNEL_PERMISSIONS = [
	"send_messages",
	"view_channel",
	"manage_messages",
	"connect",
	"speak",
	"add_reactions",
	"attach_files",
	"embed_links",
	"read_message_history",
	"mention_everyone",
] as const;

export type ChannelPermission = (typeof CHANNEL_PERMISSIONS)[number];

/** Guild-wide permissions a newly created role may be granted. */
export const ROLE_PERMISSIONS = [
	"manage_messages",
	"kick_members",
	"ban_members",
	"administrator",
	"manage_channels",
	"manage_guild",
	"manage_roles",
] as const;

export type RolePermission = (typeof ROLE_PERMISSIONS)[number];

export type PermissionMap = Partial<Record<ChannelPermission, boolean>>;

// ============================================
// Definitions
// ============================================

/**
 * Declares one action kind: what `target` means, which params it takes
 * and how risky it is.
 */
export interface ActionDefinition {
	kind: ActionKind;
	/** Human-readable description (also shown to the model) */
	description: string;
	/** What the `target` field names for this kind */
	target: string;
	riskLevel: RiskLevel;
	/** Capability the requester needs (administrators bypass) */
	capability: GuildCapability;
	/** Zod schema for `params` */
	params: z.ZodTypeAny;
}

// ============================================
// Platform references
// ============================================

export type ObjectType = "channel" | "category" | "role" | "member";

/**
 * Reference to a platform object created or modified by an action.
 */
export interface ObjectRef {
	id: string;
	name: string;
	type: ObjectType;
}

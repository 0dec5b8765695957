import {
	CHANNEL_PERMISSIONS,
	type ChannelPermission,
	type GuildCapability,
	type PermissionMap,
	type RolePermission,
} from "@guildhand/actions";
import { type PermissionOverwriteOptions, PermissionFlagsBits, type PermissionsBitField } from "discord.js";

type PermissionFlag = keyof typeof PermissionFlagsBits;

const CHANNEL_FLAGS: Record<ChannelPermission, PermissionFlag> = {
	send_messages: "SendMessages",
	view_channel: "ViewChannel",
	manage_messages: "ManageMessages",
	connect: "Connect",
	speak: "Speak",
	add_reactions: "AddReactions",
	attach_files: "AttachFiles",
	embed_links: "EmbedLinks",
	read_message_history: "ReadMessageHistory",
	mention_everyone: "MentionEveryone",
};

const ROLE_FLAGS: Record<RolePermission, PermissionFlag> = {
	manage_messages: "ManageMessages",
	kick_members: "KickMembers",
	ban_members: "BanMembers",
	administrator: "Administrator",
	manage_channels: "ManageChannels",
	manage_guild: "ManageGuild",
	manage_roles: "ManageRoles",
};

const CAPABILITY_FLAGS: ReadonlyArray<[GuildCapability, bigint]> = [
	["administrator", PermissionFlagsBits.Administrator],
	["manage_guild", PermissionFlagsBits.ManageGuild],
	["manage_channels", PermissionFlagsBits.ManageChannels],
	["manage_roles", PermissionFlagsBits.ManageRoles],
];

/**
 * Capabilities held by a member, read from their resolved guild permissions.
 */
export function capabilitiesOf(permissions: Readonly<PermissionsBitField>): GuildCapability[] {
	const held: GuildCapability[] = [];
	for (const [capability, flag] of CAPABILITY_FLAGS) {
		if (permissions.has(flag, false)) {
			held.push(capability);
		}
	}
	return held;
}

export function toOverwriteOptions(permissions: PermissionMap): PermissionOverwriteOptions {
	const options: PermissionOverwriteOptions = {};
	for (const name of CHANNEL_PERMISSIONS) {
		const allowed = permissions[name];
		if (allowed !== undefined) {
			options[CHANNEL_FLAGS[name]] = allowed;
		}
	}
	return options;
}

/** Splits a permission map into allow and deny bitfields for a new overwrite. */
export function toAllowDeny(permissions: PermissionMap): { allow: bigint[]; deny: bigint[] } {
	const allow: bigint[] = [];
	const deny: bigint[] = [];
	for (const name of CHANNEL_PERMISSIONS) {
		const allowed = permissions[name];
		if (allowed === true) allow.push(PermissionFlagsBits[CHANNEL_FLAGS[name]]);
		if (allowed === false) deny.push(PermissionFlagsBits[CHANNEL_FLAGS[name]]);
	}
	return { allow, deny };
}

export function toRoleFlags(permissions: readonly RolePermission[]): bigint[] {
	return permissions.map((name) => PermissionFlagsBits[ROLE_FLAGS[name]]);
}

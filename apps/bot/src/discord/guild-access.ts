/**
 * Discord implementation of PlatformAccess.
 *
 * Resolves references against one guild and maps discord.js API failures to
 * PlatformError codes.
 */

import type { ObjectRef, PermissionMap } from "@guildhand/actions";
import { executor } from "@guildhand/services";
import {
	type CategoryChannel,
	ChannelType,
	DiscordAPIError,
	type Guild,
	type GuildBasedChannel,
	type GuildMember,
	type NonThreadGuildBasedChannel,
	type OverwriteResolvable,
	type Role,
} from "discord.js";
import { toAllowDeny, toOverwriteOptions, toRoleFlags } from "./permissions";
import { matchesMember, normalizeChannelName, parseId, sameName } from "./references";

const MEMBER_SEARCH_LIMIT = 10;

const NOT_FOUND_CODES = new Set<number | string>([10003, 10004, 10007, 10011, 10013]);

/**
 * Map any error thrown by discord.js to a PlatformError.
 */
export function toPlatformError(err: unknown, operation: string): executor.PlatformError {
	if (err instanceof executor.PlatformError) return err;

	if (err instanceof DiscordAPIError) {
		const message = `${operation}: ${err.message}`;
		if (err.code === 50013 || err.code === 50001) {
			return new executor.PlatformError("permission_denied", message);
		}
		if (NOT_FOUND_CODES.has(err.code)) {
			return new executor.PlatformError("not_found", message);
		}
		if (err.status === 429) {
			return new executor.PlatformError("rate_limited", message);
		}
		return new executor.PlatformError("unknown", message);
	}

	const reason = err instanceof Error ? err.message : String(err);
	return new executor.PlatformError("unknown", `${operation}: ${reason}`);
}

function channelRef(channel: NonThreadGuildBasedChannel): ObjectRef {
	return {
		id: channel.id,
		name: channel.name,
		type: channel.type === ChannelType.GuildCategory ? "category" : "channel",
	};
}

function roleRef(role: Role): ObjectRef {
	return { id: role.id, name: role.name, type: "role" };
}

function memberRef(member: GuildMember): ObjectRef {
	return { id: member.id, name: member.displayName, type: "member" };
}

function memberNames(member: GuildMember) {
	return { username: member.user.username, displayName: member.displayName, tag: member.user.tag };
}

export class DiscordGuildAccess implements executor.PlatformAccess {
	constructor(private readonly guild: Guild) {}

	// ============================================
	// Resolution
	// ============================================

	private async findChannel(reference: string): Promise<GuildBasedChannel | null> {
		const id = parseId(reference, "channel");
		if (id) {
			return this.guild.channels.cache.get(id) ?? (await this.guild.channels.fetch(id));
		}
		const normalized = normalizeChannelName(reference);
		return (
			this.guild.channels.cache.find(
				(channel) => sameName(channel.name, reference) || channel.name === normalized,
			) ?? null
		);
	}

	private async requireChannel(reference: string): Promise<NonThreadGuildBasedChannel> {
		const channel = await this.findChannel(reference);
		if (!channel) {
			throw new executor.PlatformError("not_found", `Channel not found: ${reference}`);
		}
		if (channel.isThread()) {
			throw new executor.PlatformError("unsupported", `Threads are not supported: ${channel.name}`);
		}
		return channel;
	}

	private async findCategory(reference: string): Promise<CategoryChannel | null> {
		const id = parseId(reference, "channel");
		if (id) {
			const channel = await this.findChannel(id);
			return channel?.type === ChannelType.GuildCategory ? channel : null;
		}
		return (
			this.guild.channels.cache.find(
				(channel): channel is CategoryChannel =>
					channel.type === ChannelType.GuildCategory && sameName(channel.name, reference),
			) ?? null
		);
	}

	private async requireRole(reference: string): Promise<Role> {
		const id = parseId(reference, "role");
		const role = id
			? (this.guild.roles.cache.get(id) ?? (await this.guild.roles.fetch(id)))
			: this.guild.roles.cache.find((candidate) => sameName(candidate.name, reference));
		if (!role) {
			throw new executor.PlatformError("not_found", `Role not found: ${reference}`);
		}
		return role;
	}

	private async findMember(reference: string): Promise<GuildMember | null> {
		const id = parseId(reference, "user");
		if (id) {
			return this.guild.members.fetch(id);
		}

		const cached = this.guild.members.cache.find((member) =>
			matchesMember(memberNames(member), reference),
		);
		if (cached) return cached;

		const query = reference.trim().split("#")[0];
		const found = await this.guild.members.fetch({ query, limit: MEMBER_SEARCH_LIMIT });
		return found.find((member) => matchesMember(memberNames(member), reference)) ?? null;
	}

	private async requireMember(reference: string): Promise<GuildMember> {
		const member = await this.findMember(reference);
		if (!member) {
			throw new executor.PlatformError("not_found", `Member not found: ${reference}`);
		}
		return member;
	}

	private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
		try {
			return await run();
		} catch (err) {
			throw toPlatformError(err, operation);
		}
	}

	private async buildOverwrites(
		overwrites: Record<string, PermissionMap> | undefined,
	): Promise<OverwriteResolvable[]> {
		const resolved: OverwriteResolvable[] = [];
		for (const [reference, permissions] of Object.entries(overwrites ?? {})) {
			const role = await this.requireRole(reference);
			resolved.push({ id: role.id, ...toAllowDeny(permissions) });
		}
		return resolved;
	}

	// ============================================
	// PlatformAccess
	// ============================================

	createChannel(spec: executor.ChannelSpec): Promise<ObjectRef> {
		return this.call("create channel", async () => {
			let parent: CategoryChannel | null = null;
			if (spec.category) {
				parent = await this.findCategory(spec.category);
				if (!parent && parseId(spec.category, "channel")) {
					throw new executor.PlatformError("not_found", `Category not found: ${spec.category}`);
				}
				parent ??= await this.guild.channels.create({
					name: spec.category,
					type: ChannelType.GuildCategory,
				});
			}

			const channel = await this.guild.channels.create({
				name: spec.name,
				type: spec.type === "voice" ? ChannelType.GuildVoice : ChannelType.GuildText,
				parent,
				permissionOverwrites: await this.buildOverwrites(spec.overwrites),
			});
			return channelRef(channel);
		});
	}

	deleteChannel(reference: string): Promise<ObjectRef> {
		return this.call("delete channel", async () => {
			const channel = await this.requireChannel(reference);
			const ref = channelRef(channel);
			await channel.delete();
			return ref;
		});
	}

	createRole(spec: executor.RoleSpec): Promise<ObjectRef> {
		return this.call("create role", async () => {
			const existing = this.guild.roles.cache.find((role) => sameName(role.name, spec.name));
			if (existing) {
				throw new executor.PlatformError("duplicate", `Role already exists: ${existing.name}`);
			}
			const role = await this.guild.roles.create({
				name: spec.name,
				color: spec.color ? Number.parseInt(spec.color.slice(1), 16) : undefined,
				permissions: toRoleFlags(spec.permissions ?? []),
			});
			return roleRef(role);
		});
	}

	deleteRole(reference: string): Promise<ObjectRef> {
		return this.call("delete role", async () => {
			const role = await this.requireRole(reference);
			const ref = roleRef(role);
			await role.delete();
			return ref;
		});
	}

	assignRole(member: string, role: string): Promise<ObjectRef> {
		return this.call("assign role", async () => {
			const target = await this.requireMember(member);
			await target.roles.add(await this.requireRole(role));
			return memberRef(target);
		});
	}

	removeRole(member: string, role: string): Promise<ObjectRef> {
		return this.call("remove role", async () => {
			const target = await this.requireMember(member);
			await target.roles.remove(await this.requireRole(role));
			return memberRef(target);
		});
	}

	setChannelLock(reference: string, locked: boolean): Promise<ObjectRef> {
		return this.call(locked ? "lock channel" : "unlock channel", async () => {
			const channel = await this.requireChannel(reference);
			if (channel.type !== ChannelType.GuildText) {
				throw new executor.PlatformError(
					"unsupported",
					`Only text channels can be ${locked ? "locked" : "unlocked"}: ${channel.name}`,
				);
			}
			await channel.permissionOverwrites.edit(this.guild.roles.everyone, { SendMessages: !locked });
			return channelRef(channel);
		});
	}

	createCategory(name: string): Promise<ObjectRef> {
		return this.call("create category", async () => {
			const existing = await this.findCategory(name);
			if (existing) {
				throw new executor.PlatformError("duplicate", `Category already exists: ${existing.name}`);
			}
			const category = await this.guild.channels.create({ name, type: ChannelType.GuildCategory });
			return channelRef(category);
		});
	}

	setChannelPermissions(
		reference: string,
		subject: executor.PermissionSubject,
		permissions: PermissionMap,
	): Promise<ObjectRef> {
		return this.call("set channel permissions", async () => {
			const channel = await this.requireChannel(reference);
			if (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildVoice) {
				throw new executor.PlatformError(
					"unsupported",
					`Cannot set permissions on this channel type: ${channel.name}`,
				);
			}

			const target =
				subject.type === "user"
					? await this.requireMember(subject.ref)
					: subject.type === "role"
						? await this.requireRole(subject.ref)
						: await this.requireRole(subject.ref).catch(() => this.requireMember(subject.ref));

			await channel.permissionOverwrites.edit(target, toOverwriteOptions(permissions));
			return channelRef(channel);
		});
	}
}

import type { Action, ObjectRef, PermissionMap, RolePermission } from "@guildhand/actions";

// ============================================
// Platform access
// ============================================

export type PlatformErrorCode =
	| "permission_denied"
	| "not_found"
	| "duplicate"
	| "rate_limited"
	| "unsupported"
	| "unknown";

/**
 * Raised by a PlatformAccess implementation when the platform rejects an operation.
 */
export class PlatformError extends Error {
	constructor(
		public readonly code: PlatformErrorCode,
		message: string,
	) {
		super(message);
		this.name = "PlatformError";
	}
}

export interface ChannelSpec {
	name: string;
	type: "text" | "voice";
	/** Category id or name */
	category?: string;
	/** Permission overwrites keyed by role id or name */
	overwrites?: Record<string, PermissionMap>;
}

export interface RoleSpec {
	name: string;
	color?: string;
	permissions?: RolePermission[];
}

export interface PermissionSubject {
	ref: string;
	type?: "role" | "user";
}

/**
 * Capability handle for one guild. Every reference accepts an id, a mention or a name.
 */
export interface PlatformAccess {
	createChannel(spec: ChannelSpec): Promise<ObjectRef>;
	deleteChannel(channel: string): Promise<ObjectRef>;
	createRole(spec: RoleSpec): Promise<ObjectRef>;
	deleteRole(role: string): Promise<ObjectRef>;
	/** Returns the member the role was given to */
	assignRole(member: string, role: string): Promise<ObjectRef>;
	removeRole(member: string, role: string): Promise<ObjectRef>;
	setChannelLock(channel: string, locked: boolean): Promise<ObjectRef>;
	createCategory(name: string): Promise<ObjectRef>;
	setChannelPermissions(
		channel: string,
		subject: PermissionSubject,
		permissions: PermissionMap,
	): Promise<ObjectRef>;
}

// ============================================
// Outcomes
// ============================================

export type ActionOutcome =
	| Readonly<{ action: Action; succeeded: true; resultRef: ObjectRef; durationMs: number }>
	| Readonly<{ action: Action; succeeded: false; errorReason: string; durationMs: number }>;

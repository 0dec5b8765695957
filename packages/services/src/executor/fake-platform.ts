import type { ObjectRef, ObjectType, PermissionMap } from "@guildhand/actions";
import {
	type ChannelSpec,
	type PermissionSubject,
	type PlatformAccess,
	PlatformError,
	type RoleSpec,
} from "./types";

/**
 * In-process PlatformAccess for tests. Objects get sequential ids from 100,
 * channel names are normalized the way Discord does it, and every call is
 * recorded as one line in `calls`.
 */
export class FakePlatform implements PlatformAccess {
	readonly calls: string[] = [];
	readonly objects: ObjectRef[];
	/** Method name → error thrown by that method */
	readonly failures = new Map<keyof PlatformAccess, Error>();
	readonly parents = new Map<string, string>();
	readonly memberRoles = new Map<string, Set<string>>();
	readonly locked = new Set<string>();
	readonly overwrites = new Map<string, PermissionMap>();
	inFlight = 0;
	maxInFlight = 0;
	private nextId = 100;

	constructor(seed: ObjectRef[] = []) {
		this.objects = [...seed];
	}

	private async run<T>(method: keyof PlatformAccess, call: string, apply: () => T): Promise<T> {
		this.calls.push(call);
		this.inFlight++;
		this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
		try {
			await Promise.resolve();
			const failure = this.failures.get(method);
			if (failure) throw failure;
			return apply();
		} finally {
			this.inFlight--;
		}
	}

	find(reference: string, types: ObjectType[]): ObjectRef {
		const needle = reference.toLowerCase();
		const match = this.objects.find(
			(object) =>
				types.includes(object.type) &&
				(object.id === reference || object.name.toLowerCase() === needle),
		);
		if (!match) {
			throw new PlatformError("not_found", `${types[0]} not found: ${reference}`);
		}
		return match;
	}

	private add(name: string, type: ObjectType): ObjectRef {
		const ref = { id: String(this.nextId++), name, type };
		this.objects.push(ref);
		return ref;
	}

	private remove(ref: ObjectRef): ObjectRef {
		this.objects.splice(this.objects.indexOf(ref), 1);
		return ref;
	}

	createChannel(spec: ChannelSpec): Promise<ObjectRef> {
		return this.run("createChannel", `createChannel ${spec.name} ${spec.type} ${spec.category ?? "-"}`, () => {
			const category = spec.category ? this.find(spec.category, ["category"]) : undefined;
			const ref = this.add(spec.name.toLowerCase().replace(/\s+/g, "-"), "channel");
			if (category) this.parents.set(ref.id, category.id);
			for (const [role, permissions] of Object.entries(spec.overwrites ?? {})) {
				this.overwrites.set(`${ref.id}:${this.find(role, ["role"]).id}`, permissions);
			}
			return ref;
		});
	}

	deleteChannel(channel: string): Promise<ObjectRef> {
		return this.run("deleteChannel", `deleteChannel ${channel}`, () =>
			this.remove(this.find(channel, ["channel", "category"])),
		);
	}

	createRole(spec: RoleSpec): Promise<ObjectRef> {
		return this.run("createRole", `createRole ${spec.name} ${spec.color ?? "-"}`, () =>
			this.add(spec.name, "role"),
		);
	}

	deleteRole(role: string): Promise<ObjectRef> {
		return this.run("deleteRole", `deleteRole ${role}`, () => this.remove(this.find(role, ["role"])));
	}

	assignRole(member: string, role: string): Promise<ObjectRef> {
		return this.run("assignRole", `assignRole ${member} ${role}`, () => {
			const memberRef = this.find(member, ["member"]);
			const roleRef = this.find(role, ["role"]);
			const roles = this.memberRoles.get(memberRef.id) ?? new Set<string>();
			roles.add(roleRef.id);
			this.memberRoles.set(memberRef.id, roles);
			return memberRef;
		});
	}

	removeRole(member: string, role: string): Promise<ObjectRef> {
		return this.run("removeRole", `removeRole ${member} ${role}`, () => {
			const memberRef = this.find(member, ["member"]);
			this.memberRoles.get(memberRef.id)?.delete(this.find(role, ["role"]).id);
			return memberRef;
		});
	}

	setChannelLock(channel: string, locked: boolean): Promise<ObjectRef> {
		return this.run("setChannelLock", `setChannelLock ${channel} ${locked}`, () => {
			const ref = this.find(channel, ["channel"]);
			if (locked) this.locked.add(ref.id);
			else this.locked.delete(ref.id);
			return ref;
		});
	}

	createCategory(name: string): Promise<ObjectRef> {
		return this.run("createCategory", `createCategory ${name}`, () => this.add(name, "category"));
	}

	setChannelPermissions(
		channel: string,
		subject: PermissionSubject,
		permissions: PermissionMap,
	): Promise<ObjectRef> {
		return this.run(
			"setChannelPermissions",
			`setChannelPermissions ${channel} ${subject.type ?? "role"}:${subject.ref}`,
			() => {
				const ref = this.find(channel, ["channel", "category"]);
				const target = this.find(subject.ref, subject.type === "user" ? ["member"] : ["role"]);
				this.overwrites.set(`${ref.id}:${target.id}`, permissions);
				return ref;
			},
		);
	}
}

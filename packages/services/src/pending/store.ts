/**
 * Pending action store.
 *
 * Holds destructive batches awaiting their requester's confirmation, keyed by
 * an opaque token. Every operation is synchronous, so check-owner-and-remove
 * cannot interleave with another interaction on the event loop.
 */

import type { ActionList } from "@guildhand/actions";

export interface PendingEntry {
	token: string;
	actions: ActionList;
	requesterId: string;
	guildId: string | null;
	createdAt: Date;
	expiresAt: Date | null;
}

export interface PutOptions {
	guildId?: string | null;
	expiresAt?: Date | null;
}

export type TakeResult =
	| { status: "taken"; entry: PendingEntry }
	| { status: "not_found" }
	| { status: "not_owner" };

export interface PendingActionStore {
	/** Overwrites any entry already held under `token`. */
	put(token: string, actions: ActionList, requesterId: string, options?: PutOptions): void;
	/**
	 * Removes and returns the entry only when `requesterId` owns it. When
	 * `guildId` is given the entry must also belong to that guild.
	 */
	takeIfOwner(token: string, requesterId: string, guildId?: string | null): TakeResult;
	discard(token: string): void;
	has(token: string): boolean;
	readonly size: number;
	/** Drops expired entries; returns how many were removed. */
	sweepExpired(now?: Date): number;
}

function isExpired(entry: PendingEntry, now: Date): boolean {
	return entry.expiresAt !== null && entry.expiresAt.getTime() <= now.getTime();
}

export class InMemoryPendingActionStore implements PendingActionStore {
	private readonly entries = new Map<string, PendingEntry>();

	constructor(private readonly clock: () => Date = () => new Date()) {}

	put(token: string, actions: ActionList, requesterId: string, options: PutOptions = {}): void {
		this.entries.set(token, {
			token,
			actions,
			requesterId,
			guildId: options.guildId ?? null,
			createdAt: this.clock(),
			expiresAt: options.expiresAt ?? null,
		});
	}

	takeIfOwner(token: string, requesterId: string, guildId?: string | null): TakeResult {
		const entry = this.entries.get(token);
		if (!entry) {
			return { status: "not_found" };
		}
		if (isExpired(entry, this.clock())) {
			this.entries.delete(token);
			return { status: "not_found" };
		}
		if (entry.requesterId !== requesterId) {
			return { status: "not_owner" };
		}
		if (guildId !== undefined && entry.guildId !== guildId) {
			return { status: "not_owner" };
		}
		this.entries.delete(token);
		return { status: "taken", entry };
	}

	discard(token: string): void {
		this.entries.delete(token);
	}

	has(token: string): boolean {
		return this.entries.has(token);
	}

	get size(): number {
		return this.entries.size;
	}

	sweepExpired(now: Date = this.clock()): number {
		let removed = 0;
		for (const [token, entry] of this.entries) {
			if (isExpired(entry, now)) {
				this.entries.delete(token);
				removed++;
			}
		}
		return removed;
	}
}

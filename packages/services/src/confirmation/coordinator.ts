/**
 * Confirmation coordinator.
 *
 * Lists without a destructive action run immediately. Anything else waits in
 * the pending store until its requester confirms, declines, or the prompt
 * expires. Only the requester can settle an entry; everyone else is told it
 * does not exist.
 */

import { randomUUID } from "crypto";
import { type ActionList, isDestructive } from "@guildhand/actions";
import type { ActionExecutor } from "../executor/service";
import type { ActionOutcome, PlatformAccess } from "../executor/types";
import { getServicesLogger } from "../logger";
import type { PendingActionStore, PendingEntry } from "../pending/store";
import { formatPlan } from "../summary/format";

const MAX_TOKEN_ATTEMPTS = 5;

// ============================================
// Types
// ============================================

export interface ConfirmationPrompt {
	token: string;
	requesterId: string;
	/** Numbered plan, destructive steps flagged */
	summary: string;
	actions: ActionList;
	expiresAt: Date | null;
}

export type ProposalResult =
	| { state: "executed"; outcomes: ActionOutcome[] }
	| { state: "awaiting_confirmation"; prompt: ConfirmationPrompt };

export type ResolutionResult =
	| { state: "executed"; entry: PendingEntry; outcomes: ActionOutcome[] }
	| { state: "discarded"; entry: PendingEntry }
	| { state: "not_found" };

export interface ProposeInput {
	actions: ActionList;
	requesterId: string;
	guildId: string | null;
	access: PlatformAccess;
}

export interface ResolveInput {
	token: string;
	requesterId: string;
	/** Guild the choice was made in; must match the one proposed in */
	guildId: string | null;
	accepted: boolean;
	access: PlatformAccess;
}

export interface ConfirmationCoordinatorOptions {
	store: PendingActionStore;
	executor: Pick<ActionExecutor, "execute">;
	/** How long a prompt stays open; null keeps it until settled */
	confirmationTtlMs?: number | null;
	generateToken?: () => string;
	clock?: () => Date;
}

export function requiresConfirmation(actions: ActionList): boolean {
	return actions.some((action) => isDestructive(action.kind));
}

// ============================================
// Coordinator
// ============================================

export class ConfirmationCoordinator {
	private readonly store: PendingActionStore;
	private readonly executor: Pick<ActionExecutor, "execute">;
	private readonly confirmationTtlMs: number | null;
	private readonly generateToken: () => string;
	private readonly clock: () => Date;

	constructor(options: ConfirmationCoordinatorOptions) {
		this.store = options.store;
		this.executor = options.executor;
		this.confirmationTtlMs = options.confirmationTtlMs ?? null;
		this.generateToken = options.generateToken ?? randomUUID;
		this.clock = options.clock ?? (() => new Date());
	}

	async propose(input: ProposeInput): Promise<ProposalResult> {
		const log = getServicesLogger().child({ module: "confirmation" });

		if (!requiresConfirmation(input.actions)) {
			const outcomes = await this.executor.execute(input.actions, input.access);
			return { state: "executed", outcomes };
		}

		const token = this.freshToken();
		const expiresAt =
			this.confirmationTtlMs === null
				? null
				: new Date(this.clock().getTime() + this.confirmationTtlMs);
		this.store.put(token, input.actions, input.requesterId, {
			guildId: input.guildId,
			expiresAt,
		});
		log.info(
			{ confirmation: token, requesterId: input.requesterId, count: input.actions.length },
			"Awaiting confirmation",
		);

		return {
			state: "awaiting_confirmation",
			prompt: {
				token,
				requesterId: input.requesterId,
				summary: formatPlan(input.actions),
				actions: input.actions,
				expiresAt,
			},
		};
	}

	async resolve(input: ResolveInput): Promise<ResolutionResult> {
		const log = getServicesLogger().child({ module: "confirmation" });
		const taken = this.store.takeIfOwner(input.token, input.requesterId, input.guildId);

		if (taken.status !== "taken") {
			log.info(
				{ confirmation: input.token, requesterId: input.requesterId, status: taken.status },
				"Confirmation rejected",
			);
			return { state: "not_found" };
		}

		if (!input.accepted) {
			log.info({ confirmation: input.token }, "Confirmation declined");
			return { state: "discarded", entry: taken.entry };
		}

		const outcomes = await this.executor.execute(taken.entry.actions, input.access);
		return { state: "executed", entry: taken.entry, outcomes };
	}

	/** Drops a pending entry whose prompt timed out. */
	expire(token: string): void {
		this.store.discard(token);
		getServicesLogger().child({ module: "confirmation" }).debug({ confirmation: token }, "Expired");
	}

	private freshToken(): string {
		for (let attempt = 0; attempt < MAX_TOKEN_ATTEMPTS; attempt++) {
			const token = this.generateToken();
			if (!this.store.has(token)) return token;
		}
		throw new Error("Could not allocate a confirmation token");
	}
}

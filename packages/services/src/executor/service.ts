/**
 * Action executor.
 *
 * Applies a validated ActionList through a PlatformAccess handle, strictly in
 * order. A failing action is recorded and the batch carries on; nothing is
 * rolled back.
 */

import type { Action, ActionList, ObjectRef, PermissionMap } from "@guildhand/actions";
import { getServicesLogger } from "../logger";
import { CreatedObjects } from "./references";
import type { ActionOutcome, PlatformAccess } from "./types";

const CHANNEL_TYPES = ["channel", "category"] as const;

function freezeOutcome(outcome: ActionOutcome): ActionOutcome {
	return Object.freeze(outcome);
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function resolveOverwrites(
	overwrites: Record<string, PermissionMap> | undefined,
	created: CreatedObjects,
): Record<string, PermissionMap> | undefined {
	if (!overwrites) return undefined;
	return Object.fromEntries(
		Object.entries(overwrites).map(([role, permissions]) => [
			created.resolve(role, ["role"]),
			permissions,
		]),
	);
}

async function applyAction(
	action: Action,
	access: PlatformAccess,
	created: CreatedObjects,
): Promise<ObjectRef> {
	switch (action.kind) {
		case "create_channel":
			return access.createChannel({
				name: action.target,
				type: action.params.type,
				category: action.params.category
					? created.resolve(action.params.category, ["category"])
					: undefined,
				overwrites: resolveOverwrites(action.params.overwrites, created),
			});
		case "delete_channel":
			return access.deleteChannel(created.resolve(action.target, [...CHANNEL_TYPES]));
		case "create_role":
			return access.createRole({
				name: action.target,
				color: action.params.color,
				permissions: action.params.permissions,
			});
		case "delete_role":
			return access.deleteRole(created.resolve(action.target, ["role"]));
		case "assign_role":
			return access.assignRole(action.target, created.resolve(action.params.role, ["role"]));
		case "remove_role":
			return access.removeRole(action.target, created.resolve(action.params.role, ["role"]));
		case "lock_channel":
			return access.setChannelLock(created.resolve(action.target, ["channel"]), true);
		case "unlock_channel":
			return access.setChannelLock(created.resolve(action.target, ["channel"]), false);
		case "create_category":
			return access.createCategory(action.target);
		case "set_channel_permissions": {
			const subjectType = action.params.subjectType;
			const subjectRef =
				subjectType === "user"
					? action.params.subject
					: created.resolve(action.params.subject, ["role"]);
			return access.setChannelPermissions(
				created.resolve(action.target, [...CHANNEL_TYPES]),
				{ ref: subjectRef, type: subjectType },
				action.params.permissions,
			);
		}
	}
}

function createsObject(action: Action): boolean {
	return (
		action.kind === "create_channel" ||
		action.kind === "create_role" ||
		action.kind === "create_category"
	);
}

export interface ActionExecutorOptions {
	/** Millisecond clock used for durations */
	now?: () => number;
}

export class ActionExecutor {
	private readonly now: () => number;

	constructor(options: ActionExecutorOptions = {}) {
		this.now = options.now ?? (() => performance.now());
	}

	/**
	 * Run every action in order. The result has one outcome per action, in input order.
	 */
	async execute(actions: ActionList, access: PlatformAccess): Promise<ActionOutcome[]> {
		const log = getServicesLogger().child({ module: "executor" });
		const created = new CreatedObjects();
		const outcomes: ActionOutcome[] = [];

		for (const [index, action] of actions.entries()) {
			const startMs = this.now();
			try {
				const resultRef = await applyAction(action, access, created);
				const durationMs = Math.round(this.now() - startMs);
				if (createsObject(action)) {
					created.record(resultRef, action.target);
				}
				outcomes.push(freezeOutcome({ action, succeeded: true, resultRef, durationMs }));
				log.debug({ index, kind: action.kind, ref: resultRef.id, durationMs }, "Action applied");
			} catch (err) {
				const durationMs = Math.round(this.now() - startMs);
				outcomes.push(
					freezeOutcome({ action, succeeded: false, errorReason: errorMessage(err), durationMs }),
				);
				log.warn({ err, index, kind: action.kind, durationMs }, "Action failed");
			}
		}

		const failed = outcomes.filter((outcome) => !outcome.succeeded).length;
		log.info({ count: outcomes.length, failed }, "Batch executed");
		return outcomes;
	}
}

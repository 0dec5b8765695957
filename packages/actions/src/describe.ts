import type { Action } from "./definitions";
import type { PermissionMap } from "./types";

function formatPermissions(permissions: PermissionMap): string {
	return Object.entries(permissions)
		.map(([name, allowed]) => `${allowed ? "+" : "-"}${name}`)
		.join(" ");
}

/**
 * Human-readable one-liner for an action, used in confirmation prompts and summaries.
 */
export function describeAction(action: Action): string {
	switch (action.kind) {
		case "create_channel": {
			const where = action.params.category ? ` in category ${action.params.category}` : "";
			return `Create ${action.params.type} channel "${action.target}"${where}`;
		}
		case "delete_channel":
			return `Delete channel "${action.target}"`;
		case "create_role": {
			const color = action.params.color ? ` (${action.params.color})` : "";
			return `Create role "${action.target}"${color}`;
		}
		case "delete_role":
			return `Delete role "${action.target}"`;
		case "assign_role":
			return `Assign role "${action.params.role}" to ${action.target}`;
		case "remove_role":
			return `Remove role "${action.params.role}" from ${action.target}`;
		case "lock_channel":
			return `Lock channel "${action.target}"`;
		case "unlock_channel":
			return `Unlock channel "${action.target}"`;
		case "create_category":
			return `Create category "${action.target}"`;
		case "set_channel_permissions": {
			const subject = action.params.subjectType
				? `${action.params.subjectType} ${action.params.subject}`
				: action.params.subject;
			return `Set permissions on "${action.target}" for ${subject}: ${formatPermissions(action.params.permissions)}`;
		}
	}
}

import { type ActionList, type GuildCapability, getActionDefinition } from "@guildhand/actions";

export type AuthorizationResult =
	| { allowed: true }
	| { allowed: false; reason: string; missing: GuildCapability[] };

const CAPABILITY_LABELS: Record<GuildCapability, string> = {
	administrator: "Administrator",
	manage_guild: "Manage Server",
	manage_channels: "Manage Channels",
	manage_roles: "Manage Roles",
};

/**
 * Decide whether a requester holding `capabilities` may run `actions`.
 *
 * Administrators may run anything. Everyone else needs Manage Server plus the
 * capability each action kind declares.
 */
export function authorize(
	capabilities: Iterable<GuildCapability>,
	actions: ActionList,
): AuthorizationResult {
	const held = new Set(capabilities);
	if (held.has("administrator")) {
		return { allowed: true };
	}

	if (!held.has("manage_guild")) {
		return {
			allowed: false,
			reason: "You need the Manage Server permission to use admin commands.",
			missing: ["manage_guild"],
		};
	}

	const missing = new Set<GuildCapability>();
	for (const action of actions) {
		const capability = getActionDefinition(action.kind)?.capability;
		if (capability && !held.has(capability)) {
			missing.add(capability);
		}
	}

	if (missing.size > 0) {
		const labels = [...missing].map((capability) => CAPABILITY_LABELS[capability]);
		return {
			allowed: false,
			reason: `You are missing permission(s): ${labels.join(", ")}.`,
			missing: [...missing],
		};
	}
	return { allowed: true };
}

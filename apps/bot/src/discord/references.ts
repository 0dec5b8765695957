/**
 * Parsing of the ways a requester or the model can name a guild object:
 * a snowflake id, a mention, or a plain name.
 */

export type MentionKind = "channel" | "role" | "user";

const SNOWFLAKE = /^\d{17,20}$/;

const MENTION_PATTERNS: Record<MentionKind, RegExp> = {
	channel: /^<#(\d{17,20})>$/,
	role: /^<@&(\d{17,20})>$/,
	user: /^<@!?(\d{17,20})>$/,
};

/**
 * The id a reference points at, when it is an id or a mention of the given kind.
 */
export function parseId(reference: string, kind: MentionKind): string | null {
	const trimmed = reference.trim();
	if (SNOWFLAKE.test(trimmed)) return trimmed;
	const match = MENTION_PATTERNS[kind].exec(trimmed);
	return match?.[1] ?? null;
}

export function mention(kind: MentionKind, id: string): string {
	switch (kind) {
		case "channel":
			return `<#${id}>`;
		case "role":
			return `<@&${id}>`;
		case "user":
			return `<@${id}>`;
	}
}

/** Text channel names are lowercase with dashes for spaces. */
export function normalizeChannelName(name: string): string {
	return name.trim().toLowerCase().replace(/\s+/g, "-");
}

export function sameName(candidate: string, reference: string): boolean {
	return candidate.toLowerCase() === reference.trim().toLowerCase();
}

export interface MemberNames {
	username: string;
	displayName: string;
	tag: string;
}

/** Matches username, display name or the legacy `name#1234` tag, case-insensitively. */
export function matchesMember(member: MemberNames, reference: string): boolean {
	return (
		sameName(member.username, reference) ||
		sameName(member.displayName, reference) ||
		sameName(member.tag, reference)
	);
}

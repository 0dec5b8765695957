import { confirmation, executor, summary } from "@guildhand/services";
import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder } from "discord.js";

const CUSTOM_ID_PREFIX = "guildhand";
// Embed descriptions are capped at 4096 characters
const MAX_DESCRIPTION = 4000;

const COLORS = {
	pending: 0xe67e22,
	success: 0x2ecc71,
	partial: 0xf1c40f,
	failure: 0xe74c3c,
	neutral: 0x95a5a6,
} as const;

export type Decision = "confirm" | "cancel";

// ============================================
// Custom ids
// ============================================

export function buildCustomId(decision: Decision, token: string): string {
	return `${CUSTOM_ID_PREFIX}:${decision}:${token}`;
}

export function parseCustomId(customId: string): { decision: Decision; token: string } | null {
	const [prefix, decision, ...rest] = customId.split(":");
	const token = rest.join(":");
	if (prefix !== CUSTOM_ID_PREFIX || !token) return null;
	if (decision !== "confirm" && decision !== "cancel") return null;
	return { decision, token };
}

// ============================================
// Components
// ============================================

export function buildConfirmationRow(token: string, disabled = false): ActionRowBuilder<ButtonBuilder> {
	return new ActionRowBuilder<ButtonBuilder>().addComponents(
		new ButtonBuilder()
			.setCustomId(buildCustomId("confirm", token))
			.setLabel("Confirm")
			.setStyle(ButtonStyle.Danger)
			.setDisabled(disabled),
		new ButtonBuilder()
			.setCustomId(buildCustomId("cancel", token))
			.setLabel("Cancel")
			.setStyle(ButtonStyle.Secondary)
			.setDisabled(disabled),
	);
}

function truncate(text: string): string {
	return text.length > MAX_DESCRIPTION ? `${text.slice(0, MAX_DESCRIPTION - 1)}…` : text;
}

export function buildPlanEmbed(prompt: confirmation.ConfirmationPrompt, timeoutSeconds: number): EmbedBuilder {
	return new EmbedBuilder()
		.setTitle("Confirm admin actions")
		.setDescription(truncate(prompt.summary))
		.setColor(COLORS.pending)
		.setFooter({
			text: `Only the requester can confirm. Expires in ${timeoutSeconds} seconds.`,
		});
}

export function buildSummaryEmbed(outcomes: readonly executor.ActionOutcome[]): EmbedBuilder {
	const { header, lines } = summary.formatOutcomeSummary(outcomes);
	const failed = outcomes.filter((outcome) => !outcome.succeeded).length;
	const color =
		failed === 0 ? COLORS.success : failed === outcomes.length ? COLORS.failure : COLORS.partial;

	return new EmbedBuilder()
		.setTitle(header)
		.setDescription(truncate(lines.join("\n") || "No actions were run."))
		.setColor(color);
}

export function buildNoticeEmbed(title: string, description: string): EmbedBuilder {
	return new EmbedBuilder().setTitle(title).setDescription(truncate(description)).setColor(COLORS.neutral);
}

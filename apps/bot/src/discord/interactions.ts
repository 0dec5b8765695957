/**
 * Interaction handling: slash commands in, confirmation buttons back.
 *
 * Every command, AI or direct, goes through the same path: build actions,
 * authorize, then hand the list to the confirmation coordinator.
 */

import type { ActionList } from "@guildhand/actions";
import type { Logger } from "@guildhand/logger";
import { authorization, type confirmation, type executor, summary, type translator } from "@guildhand/services";
import type { ButtonInteraction, ChatInputCommandInteraction, Guild, Interaction } from "discord.js";
import { SERVER_AI_COMMAND, buildDirectAction, readOptions } from "./commands";
import { capabilitiesOf } from "./permissions";
import {
	buildConfirmationRow,
	buildNoticeEmbed,
	buildPlanEmbed,
	buildSummaryEmbed,
	parseCustomId,
} from "./render";

const GUILD_ONLY_MESSAGE = "This command can only be used in a server.";
const FAILURE_MESSAGE = "Something went wrong while handling that request.";

export interface InteractionHandlerDependencies {
	translator: Pick<translator.InstructionTranslator, "translate">;
	coordinator: Pick<confirmation.ConfirmationCoordinator, "propose" | "resolve" | "expire">;
	createAccess: (guild: Guild) => executor.PlatformAccess;
	confirmationTimeoutMs: number;
	logger: Logger;
}

export class InteractionHandler {
	private readonly expiryTimers = new Map<string, ReturnType<typeof setTimeout>>();
	private readonly log: Logger;

	constructor(private readonly deps: InteractionHandlerDependencies) {
		this.log = deps.logger.child({ module: "interactions" });
	}

	async handle(interaction: Interaction): Promise<void> {
		try {
			if (interaction.isChatInputCommand()) {
				await this.handleCommand(interaction);
			} else if (interaction.isButton()) {
				await this.handleButton(interaction);
			}
		} catch (err) {
			this.log.error({ err, interactionId: interaction.id }, "Interaction failed");
			await this.reportFailure(interaction);
		}
	}

	/** Cancels pending expiry timers; pending entries are dropped with the process. */
	dispose(): void {
		for (const timer of this.expiryTimers.values()) {
			clearTimeout(timer);
		}
		this.expiryTimers.clear();
	}

	// ============================================
	// Commands
	// ============================================

	private async handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
		if (!interaction.inCachedGuild()) {
			await interaction.reply({ content: GUILD_ONLY_MESSAGE, ephemeral: true });
			return;
		}

		const capabilities = capabilitiesOf(interaction.memberPermissions);
		const gate = authorization.authorize(capabilities, []);
		if (!gate.allowed) {
			await interaction.reply({ content: gate.reason, ephemeral: true });
			return;
		}

		let actions: ActionList;
		if (interaction.commandName === SERVER_AI_COMMAND) {
			await interaction.deferReply();
			const instruction = interaction.options.getString("instruction", true);
			const result = await this.deps.translator.translate(instruction);
			if (!result.ok) {
				await interaction.editReply({ content: summary.describeTranslationError(result.error) });
				return;
			}
			actions = result.actions;
		} else {
			const built = buildDirectAction(interaction.commandName, readOptions(interaction.options.data));
			if (!built.ok) {
				await interaction.reply({ content: built.message, ephemeral: true });
				return;
			}
			await interaction.deferReply();
			actions = [built.action];
		}

		const decision = authorization.authorize(capabilities, actions);
		if (!decision.allowed) {
			this.log.info(
				{ userId: interaction.user.id, missing: decision.missing },
				"Request denied",
			);
			await interaction.editReply({ content: decision.reason });
			return;
		}

		const proposal = await this.deps.coordinator.propose({
			actions,
			requesterId: interaction.user.id,
			guildId: interaction.guildId,
			access: this.deps.createAccess(interaction.guild),
		});

		if (proposal.state === "executed") {
			await interaction.editReply({ embeds: [buildSummaryEmbed(proposal.outcomes)] });
			return;
		}

		const { prompt } = proposal;
		await interaction.editReply({
			content: `<@${prompt.requesterId}>, this includes destructive actions.`,
			embeds: [buildPlanEmbed(prompt, Math.round(this.deps.confirmationTimeoutMs / 1000))],
			components: [buildConfirmationRow(prompt.token)],
		});
		this.scheduleExpiry(prompt.token, interaction);
	}

	// ============================================
	// Buttons
	// ============================================

	private async handleButton(interaction: ButtonInteraction): Promise<void> {
		const parsed = parseCustomId(interaction.customId);
		if (!parsed) return;

		if (!interaction.inCachedGuild()) {
			await interaction.reply({ content: summary.NOT_FOUND_MESSAGE, ephemeral: true });
			return;
		}

		await interaction.deferUpdate();
		const result = await this.deps.coordinator.resolve({
			token: parsed.token,
			requesterId: interaction.user.id,
			guildId: interaction.guildId,
			accepted: parsed.decision === "confirm",
			access: this.deps.createAccess(interaction.guild),
		});

		switch (result.state) {
			case "not_found":
				await interaction.followUp({ content: summary.NOT_FOUND_MESSAGE, ephemeral: true });
				return;
			case "discarded":
				this.clearExpiry(parsed.token);
				await interaction.editReply({
					content: null,
					embeds: [buildNoticeEmbed("Cancelled", "Nothing was changed.")],
					components: [buildConfirmationRow(parsed.token, true)],
				});
				return;
			case "executed":
				this.clearExpiry(parsed.token);
				await interaction.editReply({
					content: null,
					embeds: [buildSummaryEmbed(result.outcomes)],
					components: [],
				});
				return;
		}
	}

	// ============================================
	// Expiry
	// ============================================

	private scheduleExpiry(token: string, interaction: ChatInputCommandInteraction<"cached">): void {
		const timer = setTimeout(() => {
			this.expiryTimers.delete(token);
			this.deps.coordinator.expire(token);
			interaction
				.editReply({
					content: null,
					embeds: [buildNoticeEmbed("Confirmation timed out", "Nothing was changed.")],
					components: [buildConfirmationRow(token, true)],
				})
				.catch((err: unknown) => {
					this.log.warn({ err }, "Failed to mark prompt as expired");
				});
		}, this.deps.confirmationTimeoutMs);
		timer.unref();
		this.expiryTimers.set(token, timer);
	}

	private clearExpiry(token: string): void {
		const timer = this.expiryTimers.get(token);
		if (timer) {
			clearTimeout(timer);
			this.expiryTimers.delete(token);
		}
	}

	private async reportFailure(interaction: Interaction): Promise<void> {
		if (!interaction.isRepliable()) return;
		try {
			if (interaction.replied || interaction.deferred) {
				await interaction.followUp({ content: FAILURE_MESSAGE, ephemeral: true });
			} else {
				await interaction.reply({ content: FAILURE_MESSAGE, ephemeral: true });
			}
		} catch (err) {
			this.log.warn({ err }, "Failed to report interaction failure");
		}
	}
}

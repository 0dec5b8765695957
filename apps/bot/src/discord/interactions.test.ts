import { type Action, validate } from "@guildhand/actions";
import { createLogger } from "@guildhand/logger";
import { confirmation, executor, pending, type translator } from "@guildhand/services";
import { FakePlatform } from "@guildhand/services/testing";
import {
	ApplicationCommandOptionType,
	type Interaction,
	PermissionFlagsBits,
	PermissionsBitField,
} from "discord.js";
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InteractionHandler } from "./interactions";

// ============================================
// Fakes
// ============================================

const TIMEOUT_MS = 120_000;

function action(kind: string, fields: unknown): Action {
	const result = validate(kind, fields);
	if (!result.ok) throw new Error(`Invalid fixture: ${kind}`);
	return result.action;
}

function replies() {
	return {
		replied: false,
		deferred: false,
		reply: vi.fn(async (_options: unknown) => undefined),
		deferReply: vi.fn(async () => undefined),
		deferUpdate: vi.fn(async () => undefined),
		editReply: vi.fn(async (_options: unknown) => undefined),
		followUp: vi.fn(async (_options: unknown) => undefined),
		isRepliable: () => true,
	};
}

interface CommandOverrides {
	commandName?: string;
	instruction?: string;
	data?: Array<{ name: string; type: ApplicationCommandOptionType; value: string }>;
	permissions?: bigint;
	inGuild?: boolean;
}

function commandInteraction(overrides: CommandOverrides = {}) {
	return {
		...replies(),
		id: "interaction-1",
		commandName: overrides.commandName ?? "server_ai",
		guildId: "g1",
		guild: { id: "g1" },
		user: { id: "u1" },
		memberPermissions: new PermissionsBitField(overrides.permissions ?? PermissionFlagsBits.Administrator),
		options: {
			getString: vi.fn(() => overrides.instruction ?? "delete the old-news channel"),
			data: overrides.data ?? [],
		},
		isChatInputCommand: () => true,
		isButton: () => false,
		inCachedGuild: () => overrides.inGuild ?? true,
	};
}

function buttonInteraction(customId: string, userId = "u1", guildId = "g1") {
	return {
		...replies(),
		id: "interaction-2",
		customId,
		guildId,
		guild: { id: guildId },
		user: { id: userId },
		isChatInputCommand: () => false,
		isButton: () => true,
		inCachedGuild: () => true,
	};
}

function asInteraction(fake: object): Interaction {
	return fake as unknown as Interaction;
}

// ============================================
// Setup
// ============================================

let store: pending.InMemoryPendingActionStore;
let platform: FakePlatform;
let translate: Mock<(instruction: string) => Promise<translator.TranslationResult>>;
let handler: InteractionHandler;

beforeEach(() => {
	vi.useFakeTimers();
	store = new pending.InMemoryPendingActionStore();
	platform = new FakePlatform([
		{ id: "7", name: "general", type: "channel" },
		{ id: "8", name: "old-news", type: "channel" },
	]);
	translate = vi.fn(async (_instruction: string): Promise<translator.TranslationResult> => ({
		ok: true,
		actions: [action("delete_channel", { target: "old-news" })],
	}));
	handler = new InteractionHandler({
		translator: { translate },
		coordinator: new confirmation.ConfirmationCoordinator({
			store,
			executor: new executor.ActionExecutor(),
			confirmationTtlMs: TIMEOUT_MS,
			generateToken: () => "tok-1",
		}),
		createAccess: () => platform,
		confirmationTimeoutMs: TIMEOUT_MS,
		logger: createLogger({ service: "test", level: "silent", pretty: false }),
	});
});

afterEach(() => {
	handler.dispose();
	vi.useRealTimers();
});

const titled = (title: string) => expect.objectContaining({ data: expect.objectContaining({ title }) });

// ============================================
// Commands
// ============================================

describe("InteractionHandler commands", () => {
	it("refuses commands outside a server", async () => {
		const interaction = commandInteraction({ inGuild: false });

		await handler.handle(asInteraction(interaction));

		expect(interaction.reply).toHaveBeenCalledWith({
			content: "This command can only be used in a server.",
			ephemeral: true,
		});
		expect(translate).not.toHaveBeenCalled();
	});

	it("checks Manage Server before asking the model", async () => {
		const interaction = commandInteraction({ permissions: PermissionFlagsBits.SendMessages });

		await handler.handle(asInteraction(interaction));

		expect(interaction.reply).toHaveBeenCalledWith({
			content: "You need the Manage Server permission to use admin commands.",
			ephemeral: true,
		});
		expect(translate).not.toHaveBeenCalled();
	});

	it("reports translation failures in the deferred reply", async () => {
		translate.mockResolvedValueOnce({
			ok: false,
			error: { code: "inference_unavailable", message: "Deadline of 20000ms exceeded" },
		});
		const interaction = commandInteraction();

		await handler.handle(asInteraction(interaction));

		expect(interaction.deferReply).toHaveBeenCalledTimes(1);
		expect(interaction.editReply).toHaveBeenCalledWith({ content: "AI unavailable, try again." });
		expect(store.size).toBe(0);
	});

	it("runs lists without destructive actions straight away", async () => {
		translate.mockResolvedValueOnce({
			ok: true,
			actions: [action("lock_channel", { target: "general" })],
		});
		const interaction = commandInteraction({ instruction: "lock general" });

		await handler.handle(asInteraction(interaction));

		expect(platform.calls).toEqual(["setChannelLock general true"]);
		expect(interaction.editReply).toHaveBeenCalledWith({
			embeds: [titled("Executed 1 action(s): 1 succeeded, 0 failed")],
		});
	});

	it("holds destructive lists behind a confirmation prompt", async () => {
		const interaction = commandInteraction();

		await handler.handle(asInteraction(interaction));

		expect(platform.calls).toEqual([]);
		expect(store.has("tok-1")).toBe(true);
		expect(interaction.editReply).toHaveBeenCalledWith({
			content: "<@u1>, this includes destructive actions.",
			embeds: [titled("Confirm admin actions")],
			components: [expect.anything()],
		});
	});

	it("expires the prompt after the confirmation timeout", async () => {
		const interaction = commandInteraction();
		await handler.handle(asInteraction(interaction));

		await vi.advanceTimersByTimeAsync(TIMEOUT_MS);

		expect(store.has("tok-1")).toBe(false);
		expect(interaction.editReply).toHaveBeenCalledTimes(2);
		expect(interaction.editReply).toHaveBeenLastCalledWith({
			content: null,
			embeds: [titled("Confirmation timed out")],
			components: [expect.anything()],
		});
	});

	it("sends direct commands through the same confirmation", async () => {
		const interaction = commandInteraction({
			commandName: "delete_channel",
			data: [{ name: "channel", type: ApplicationCommandOptionType.Channel, value: "8" }],
		});

		await handler.handle(asInteraction(interaction));

		expect(translate).not.toHaveBeenCalled();
		expect(store.has("tok-1")).toBe(true);
		expect(platform.calls).toEqual([]);
	});

	it("answers invalid direct commands ephemerally", async () => {
		const interaction = commandInteraction({ commandName: "delete_channel" });

		await handler.handle(asInteraction(interaction));

		expect(interaction.reply).toHaveBeenCalledWith(expect.objectContaining({ ephemeral: true }));
		expect(interaction.deferReply).not.toHaveBeenCalled();
		expect(store.size).toBe(0);
	});
});

// ============================================
// Buttons
// ============================================

describe("InteractionHandler buttons", () => {
	let command: ReturnType<typeof commandInteraction>;

	beforeEach(async () => {
		command = commandInteraction();
		await handler.handle(asInteraction(command));
	});

	it("executes the batch when the requester confirms", async () => {
		const button = buttonInteraction("guildhand:confirm:tok-1");

		await handler.handle(asInteraction(button));

		expect(button.deferUpdate).toHaveBeenCalledTimes(1);
		expect(platform.calls).toEqual(["deleteChannel old-news"]);
		expect(button.editReply).toHaveBeenCalledWith({
			content: null,
			embeds: [titled("Executed 1 action(s): 1 succeeded, 0 failed")],
			components: [],
		});

		await vi.advanceTimersByTimeAsync(TIMEOUT_MS);
		expect(command.editReply).toHaveBeenCalledTimes(1);
	});

	it("discards the batch when the requester cancels", async () => {
		const button = buttonInteraction("guildhand:cancel:tok-1");

		await handler.handle(asInteraction(button));

		expect(platform.calls).toEqual([]);
		expect(store.size).toBe(0);
		expect(button.editReply).toHaveBeenCalledWith({
			content: null,
			embeds: [titled("Cancelled")],
			components: [expect.anything()],
		});

		await vi.advanceTimersByTimeAsync(TIMEOUT_MS);
		expect(command.editReply).toHaveBeenCalledTimes(1);
	});

	it("tells anyone else the action does not exist", async () => {
		const button = buttonInteraction("guildhand:confirm:tok-1", "u2");

		await handler.handle(asInteraction(button));

		expect(button.followUp).toHaveBeenCalledWith({ content: "No such pending action.", ephemeral: true });
		expect(button.editReply).not.toHaveBeenCalled();
		expect(store.has("tok-1")).toBe(true);
		expect(platform.calls).toEqual([]);
	});

	it("does not run a batch from another server", async () => {
		const button = buttonInteraction("guildhand:confirm:tok-1", "u1", "g2");

		await handler.handle(asInteraction(button));

		expect(button.followUp).toHaveBeenCalledWith({ content: "No such pending action.", ephemeral: true });
		expect(store.has("tok-1")).toBe(true);
		expect(platform.calls).toEqual([]);
	});

	it("ignores buttons it did not create", async () => {
		const button = buttonInteraction("someone-else:confirm:tok-1");

		await handler.handle(asInteraction(button));

		expect(button.deferUpdate).not.toHaveBeenCalled();
		expect(store.has("tok-1")).toBe(true);
	});
});

describe("InteractionHandler.dispose", () => {
	it("cancels pending expiry timers", async () => {
		const interaction = commandInteraction();
		await handler.handle(asInteraction(interaction));

		handler.dispose();
		await vi.advanceTimersByTimeAsync(TIMEOUT_MS);

		expect(store.has("tok-1")).toBe(true);
		expect(interaction.editReply).toHaveBeenCalledTimes(1);
	});
});

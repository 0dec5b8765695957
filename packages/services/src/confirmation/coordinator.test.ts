import { type Action, validate } from "@guildhand/actions";
import { beforeEach, describe, expect, it } from "vitest";
import { FakePlatform } from "../executor/fake-platform";
import { ActionExecutor } from "../executor/service";
import { InMemoryPendingActionStore } from "../pending/store";
import { ConfirmationCoordinator, requiresConfirmation } from "./coordinator";

// ============================================
// Helpers
// ============================================

function action(kind: string, fields: unknown): Action {
	const result = validate(kind, fields);
	if (!result.ok) throw new Error(`Invalid fixture: ${kind}`);
	return result.action;
}

const START = new Date("2026-01-01T00:00:00.000Z");

let now: Date;
let store: InMemoryPendingActionStore;
let platform: FakePlatform;
let coordinator: ConfirmationCoordinator;

function tokens(...values: string[]): () => string {
	const queue = [...values];
	return () => queue.shift() ?? "exhausted";
}

beforeEach(() => {
	now = START;
	store = new InMemoryPendingActionStore(() => now);
	platform = new FakePlatform([
		{ id: "7", name: "general", type: "channel" },
		{ id: "8", name: "old-news", type: "channel" },
	]);
	coordinator = new ConfirmationCoordinator({
		store,
		executor: new ActionExecutor(),
		confirmationTtlMs: 120_000,
		generateToken: tokens("tok-1", "tok-2"),
		clock: () => now,
	});
});

const deleteOldNews = () => action("delete_channel", { target: "old-news" });
const lockGeneral = () => action("lock_channel", { target: "general" });

// ============================================
// Tests
// ============================================

describe("requiresConfirmation", () => {
	it("is true when any action is destructive", () => {
		expect(requiresConfirmation([lockGeneral()])).toBe(false);
		expect(requiresConfirmation([lockGeneral(), deleteOldNews()])).toBe(true);
	});
});

describe("ConfirmationCoordinator.propose", () => {
	it("executes lists without destructive actions immediately", async () => {
		const result = await coordinator.propose({
			actions: [lockGeneral()],
			requesterId: "u1",
			guildId: "g1",
			access: platform,
		});

		expect(result.state).toBe("executed");
		expect(platform.calls).toEqual(["setChannelLock general true"]);
		expect(store.size).toBe(0);
	});

	it("holds a list with a destructive action until confirmed", async () => {
		const actions = [lockGeneral(), deleteOldNews()];
		const result = await coordinator.propose({
			actions,
			requesterId: "u1",
			guildId: "g1",
			access: platform,
		});

		expect(result).toEqual({
			state: "awaiting_confirmation",
			prompt: {
				token: "tok-1",
				requesterId: "u1",
				summary: '1. Lock channel "general"\n2. Delete channel "old-news" ⚠️',
				actions,
				expiresAt: new Date("2026-01-01T00:02:00.000Z"),
			},
		});
		expect(platform.calls).toEqual([]);
		expect(store.has("tok-1")).toBe(true);
	});

	it("never reuses a token that is already pending", async () => {
		store.put("tok-1", [deleteOldNews()], "someone-else");

		const result = await coordinator.propose({
			actions: [deleteOldNews()],
			requesterId: "u1",
			guildId: "g1",
			access: platform,
		});

		expect(result.state === "awaiting_confirmation" && result.prompt.token).toBe("tok-2");
		expect(store.size).toBe(2);
	});
});

describe("ConfirmationCoordinator.resolve", () => {
	beforeEach(async () => {
		await coordinator.propose({
			actions: [lockGeneral(), deleteOldNews()],
			requesterId: "u1",
			guildId: "g1",
			access: platform,
		});
	});

	it("runs the whole batch when the requester confirms", async () => {
		const result = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: true,
			access: platform,
		});

		expect(result.state).toBe("executed");
		expect(result.state === "executed" && result.outcomes.map((o) => o.succeeded)).toEqual([
			true,
			true,
		]);
		expect(platform.calls).toEqual(["setChannelLock general true", "deleteChannel old-news"]);
		expect(store.size).toBe(0);
	});

	it("executes at most once", async () => {
		await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: true,
			access: platform,
		});
		const second = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: true,
			access: platform,
		});

		expect(second).toEqual({ state: "not_found" });
		expect(platform.calls).toHaveLength(2);
	});

	it("answers not_found to anyone else and keeps the entry", async () => {
		const confirm = await coordinator.resolve({
			token: "tok-1",
			requesterId: "intruder",
			guildId: "g1",
			accepted: true,
			access: platform,
		});
		const decline = await coordinator.resolve({
			token: "tok-1",
			requesterId: "intruder",
			guildId: "g1",
			accepted: false,
			access: platform,
		});

		expect(confirm).toEqual({ state: "not_found" });
		expect(decline).toEqual({ state: "not_found" });
		expect(platform.calls).toEqual([]);
		expect(store.has("tok-1")).toBe(true);

		const owner = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: true,
			access: platform,
		});
		expect(owner.state).toBe("executed");
	});

	it("discards the batch when the requester declines", async () => {
		const result = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: false,
			access: platform,
		});

		expect(result.state).toBe("discarded");
		expect(platform.calls).toEqual([]);
		expect(store.size).toBe(0);
	});

	it("answers not_found for unknown tokens", async () => {
		await expect(
			coordinator.resolve({
				token: "nope",
				requesterId: "u1",
				guildId: "g1",
				accepted: true,
				access: platform,
			}),
		).resolves.toEqual({ state: "not_found" });
	});

	it("cannot confirm after expire", async () => {
		coordinator.expire("tok-1");

		const result = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: true,
			access: platform,
		});

		expect(result).toEqual({ state: "not_found" });
		expect(platform.calls).toEqual([]);
	});

	it("refuses a confirmation from another guild and keeps the entry", async () => {
		const elsewhere = new FakePlatform([{ id: "8", name: "old-news", type: "channel" }]);

		const result = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g2",
			accepted: true,
			access: elsewhere,
		});

		expect(result).toEqual({ state: "not_found" });
		expect(elsewhere.calls).toEqual([]);
		expect(store.has("tok-1")).toBe(true);
	});

	it("cannot confirm once the prompt has timed out", async () => {
		now = new Date("2026-01-01T00:02:00.000Z");

		const result = await coordinator.resolve({
			token: "tok-1",
			requesterId: "u1",
			guildId: "g1",
			accepted: true,
			access: platform,
		});

		expect(result).toEqual({ state: "not_found" });
		expect(store.size).toBe(0);
	});
});

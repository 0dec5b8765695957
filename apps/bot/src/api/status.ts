/**
 * Bot status routes.
 *
 * GET /health is the liveness check and answers 200 while the process runs.
 * GET / describes the gateway connection and answers 503 until it is ready.
 */

import { Router, type Router as RouterType } from "express";
import { ApiError } from "../middleware";

export interface BotStatus {
	status: "online";
	user: string;
	guilds: number;
	latencyMs: number;
	uptimeSeconds: number;
}

/** Returns null until the gateway connection is ready. */
export type StatusProvider = () => BotStatus | null;

export function createStatusRouter(getStatus: StatusProvider): RouterType {
	const router: RouterType = Router();

	router.get("/health", (_req, res) => {
		res.json({ status: "ok", discord: getStatus() ? "connected" : "connecting" });
	});

	router.get("/", (_req, res, next) => {
		const status = getStatus();
		if (!status) {
			return next(new ApiError(503, "Bot is not connected"));
		}
		res.json(status);
	});

	return router;
}

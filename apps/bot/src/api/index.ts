import type { Express } from "express";
import { type StatusProvider, createStatusRouter } from "./status";

export type { BotStatus, StatusProvider } from "./status";

export function mountRoutes(app: Express, getStatus: StatusProvider): void {
	app.use(createStatusRouter(getStatus));
}

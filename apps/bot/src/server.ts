/**
 * Status Server
 *
 * Small HTTP surface for uptime checks while the bot runs.
 */

import http from "http";
import { type Logger, createHttpLogger } from "@guildhand/logger";
import express, { type Express } from "express";
import { type StatusProvider, mountRoutes } from "./api";
import { createErrorHandler, notFound } from "./middleware";

export interface ServerDependencies {
	logger: Logger;
	getStatus: StatusProvider;
}

export interface ServerResult {
	app: Express;
	server: http.Server;
}

export function createStatusServer(deps: ServerDependencies): ServerResult {
	const app = express();

	app.use(createHttpLogger({ logger: deps.logger }));
	mountRoutes(app, deps.getStatus);

	app.use(notFound);
	app.use(createErrorHandler(deps.logger));

	const server = http.createServer(app);
	return { app, server };
}

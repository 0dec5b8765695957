/**
 * JSON error responses for the status server.
 */

import type { Logger } from "@guildhand/logger";
import type { ErrorRequestHandler, RequestHandler } from "express";

/**
 * Error whose message is safe to return to the caller.
 */
export class ApiError extends Error {
	constructor(
		public readonly statusCode: number,
		message: string,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "ApiError";
	}
}

export const notFound: RequestHandler = (req, _res, next) => {
	next(new ApiError(404, `No route for ${req.method} ${req.path}`));
};

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
	const log = logger.child({ module: "error-handler" });

	return (err, req, res, next) => {
		if (res.headersSent) {
			next(err);
			return;
		}
		if (err instanceof ApiError) {
			res.status(err.statusCode).json(
				err.details ? { error: err.message, details: err.details } : { error: err.message },
			);
			return;
		}

		log.error({ err, path: req.path }, "Unhandled error");
		res.status(500).json({ error: "Internal server error" });
	};
}

import type { Logger } from "pino";
import pinoHttp, { type Options as PinoHttpOptions } from "pino-http";

export interface CreateHttpLoggerOptions extends Omit<PinoHttpOptions, "logger"> {
	logger: Logger;
	/** Paths logged at debug instead of info, e.g. uptime checks */
	quietPaths?: string[];
}

export function createHttpLogger({ logger, quietPaths = ["/health"], ...options }: CreateHttpLoggerOptions) {
	const quiet = new Set(quietPaths);

	return pinoHttp({
		logger,
		customSuccessMessage(req, res, responseTime) {
			return `${req.method} ${req.url} ${res.statusCode} ${Math.round(responseTime)}ms`;
		},
		customErrorMessage(req, res, err) {
			return `${req.method} ${req.url} ${res.statusCode} ${err.message}`;
		},
		customLogLevel(req, res, err) {
			if (err || res.statusCode >= 500) return "error";
			if (res.statusCode >= 400) return "warn";
			return quiet.has(req.url ?? "") ? "debug" : "info";
		},
		// The message already carries method, url, status and timing
		serializers: {
			req: () => undefined,
			res: () => undefined,
		},
		...options,
	});
}

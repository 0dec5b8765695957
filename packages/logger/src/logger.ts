import pino, { type LevelWithSilent, type Logger, type LoggerOptions } from "pino";
import { parseLogLevel, prettyByDefault } from "./levels";

export interface CreateLoggerOptions {
	service: string;
	level?: LevelWithSilent;
	pretty?: boolean;
	base?: Record<string, unknown>;
	/** Extra paths to censor on top of the credential defaults */
	redact?: string[];
}

const REDACT_PATHS = [
	"authorization",
	"headers.authorization",
	"token",
	"apiKey",
	"secret",
	"DISCORD_TOKEN",
	"HUGGINGFACE_TOKEN",
];

// Fields the services attach to most records, surfaced in the pretty one-liner
const PRETTY_MESSAGE =
	"{msg}{if kind} [{kind}]{end}{if err} ({err.message}){end}{if durationMs} {durationMs}ms{end}{if count} count={count}{end}";

export function createLogger(options: CreateLoggerOptions): Logger {
	const loggerOptions: LoggerOptions = {
		level: options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info",
		base: { service: options.service, ...options.base },
		timestamp: pino.stdTimeFunctions.isoTime,
		serializers: { err: pino.stdSerializers.err },
		redact: {
			paths: [...REDACT_PATHS, ...(options.redact ?? [])],
			censor: "[Redacted]",
		},
	};

	if (options.pretty ?? prettyByDefault()) {
		loggerOptions.transport = {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "SYS:HH:MM:ss.l",
				ignore: "pid,hostname",
				messageFormat: PRETTY_MESSAGE,
				hideObject: true,
			},
		};
	}

	return pino(loggerOptions);
}

/**
 * Inference collaborator contract.
 *
 * The translator only needs "system prompt + instruction in, raw text out".
 * Retry policy, if any, belongs to the client, not to the caller.
 */

export interface InferenceRequest {
	systemPrompt: string;
	instruction: string;
	/** Longest the client may spend on the request, whatever happens to `signal` */
	timeoutMs: number;
	/** Aborted when the caller stops waiting */
	signal: AbortSignal;
}

export type InferenceClient = (request: InferenceRequest) => Promise<string>;

export class InferenceError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "InferenceError";
	}
}

export class DeadlineExceededError extends Error {
	constructor(public readonly timeoutMs: number) {
		super(`Deadline of ${timeoutMs}ms exceeded`);
		this.name = "DeadlineExceededError";
	}
}

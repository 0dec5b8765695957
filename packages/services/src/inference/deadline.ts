import { DeadlineExceededError } from "./types";

/**
 * Run `task` with an explicit deadline.
 *
 * Rejects with DeadlineExceededError once `timeoutMs` elapses and aborts the
 * signal handed to the task. The caller stops waiting even if the task
 * ignores the signal; the task itself is not otherwise cancelled.
 */
export async function withDeadline<T>(
	task: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
): Promise<T> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;

	const deadline = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => {
			const err = new DeadlineExceededError(timeoutMs);
			controller.abort(err);
			reject(err);
		}, timeoutMs);
	});

	try {
		return await Promise.race([Promise.resolve().then(() => task(controller.signal)), deadline]);
	} finally {
		clearTimeout(timer);
	}
}

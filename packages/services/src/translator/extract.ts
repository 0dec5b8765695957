/**
 * Locate the action array inside free-form model output.
 *
 * Models wrap the answer in prose, code fences or an `{"actions": [...]}`
 * object. Every `[` is tried as a start; the first candidate that closes and
 * parses as a JSON array wins.
 */

function tryParseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

/**
 * Index of the bracket that closes the one at `start`, or -1.
 * Brackets inside JSON strings are ignored.
 */
export function findClosingBracket(text: string, start: number): number {
	let depth = 0;
	let inString = false;
	let escaped = false;

	for (let i = start; i < text.length; i++) {
		const char = text[i];
		if (inString) {
			if (escaped) {
				escaped = false;
			} else if (char === "\\") {
				escaped = true;
			} else if (char === '"') {
				inString = false;
			}
			continue;
		}

		if (char === '"') {
			inString = true;
		} else if (char === "[") {
			depth++;
		} else if (char === "]") {
			depth--;
			if (depth === 0) return i;
		}
	}
	return -1;
}

export function extractJsonArray(text: string): unknown[] | null {
	for (let start = text.indexOf("["); start !== -1; start = text.indexOf("[", start + 1)) {
		const end = findClosingBracket(text, start);
		if (end === -1) continue;

		const parsed = tryParseJson(text.slice(start, end + 1));
		if (Array.isArray(parsed)) return parsed;
	}
	return null;
}

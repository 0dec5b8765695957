/**
 * Action validation. The only way an Action is constructed.
 *
 * Untrusted input (model output, slash-command options) is projected into the
 * closed Action union here. Anything that does not fit is reported, never
 * coerced into a partial action.
 */

import { type Action, actionSchema, isActionKind } from "./definitions";

export interface FieldIssue {
	path: string;
	message: string;
}

export type ValidationFailure =
	| { ok: false; code: "unknown_action_kind"; kind: string }
	| { ok: false; code: "missing_fields"; kind: string; missingFields: string[] }
	| { ok: false; code: "invalid_fields"; kind: string; invalidFields: FieldIssue[] }
	| { ok: false; code: "malformed_element"; message: string };

export type ValidationResult = { ok: true; action: Action } | ValidationFailure;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function valueAt(input: unknown, path: ReadonlyArray<string | number>): unknown {
	let current = input;
	for (const segment of path) {
		if (Array.isArray(current) && typeof segment === "number") {
			current = current[segment];
		} else if (isRecord(current)) {
			current = current[String(segment)];
		} else {
			return undefined;
		}
	}
	return current;
}

function deepFreeze<T>(value: T): T {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		for (const nested of Object.values(value)) {
			deepFreeze(nested);
		}
		Object.freeze(value);
	}
	return value;
}

/**
 * Validate `fields` (`target` and `params`) against the schema for `kind`.
 * Pure: no side effects, same answer for the same input.
 */
export function validate(kind: string, fields: unknown): ValidationResult {
	if (!isActionKind(kind)) {
		return { ok: false, code: "unknown_action_kind", kind };
	}

	const record = isRecord(fields) ? fields : {};
	// Absent params become {} so missing keys are reported as params.<key>
	const input = {
		kind,
		target: record.target,
		params: record.params ?? {},
	};

	const parsed = actionSchema.safeParse(input);
	if (parsed.success) {
		return { ok: true, action: deepFreeze(parsed.data) };
	}

	const missingFields = new Set<string>();
	const invalidFields: FieldIssue[] = [];
	for (const issue of parsed.error.issues) {
		const path = issue.path.join(".");
		const value = valueAt(input, issue.path);
		if (value === undefined || value === null) {
			missingFields.add(path);
		} else {
			invalidFields.push({ path, message: issue.message });
		}
	}

	if (missingFields.size > 0) {
		return { ok: false, code: "missing_fields", kind, missingFields: [...missingFields] };
	}
	return { ok: false, code: "invalid_fields", kind, invalidFields };
}

/**
 * Strict projection of one parsed JSON value into an Action.
 * Reads `kind` (or the older `type` key), `target` and `params`.
 */
export function parseAction(raw: unknown): ValidationResult {
	if (!isRecord(raw)) {
		return { ok: false, code: "malformed_element", message: "Expected an object" };
	}

	const kind = raw.kind ?? raw.type;
	if (typeof kind !== "string" || kind.trim() === "") {
		return { ok: false, code: "malformed_element", message: "Missing action kind" };
	}

	return validate(kind.trim(), { target: raw.target, params: raw.params });
}

/**
 * One-line reason for a failed validation, suitable for showing to the requester.
 */
export function describeValidationFailure(failure: ValidationFailure): string {
	switch (failure.code) {
		case "unknown_action_kind":
			return `Unknown action kind "${failure.kind}"`;
		case "missing_fields":
			return `${failure.kind}: missing required field(s): ${failure.missingFields.join(", ")}`;
		case "invalid_fields":
			return `${failure.kind}: ${failure.invalidFields
				.map((issue) => `${issue.path}: ${issue.message}`)
				.join("; ")}`;
		case "malformed_element":
			return failure.message;
	}
}

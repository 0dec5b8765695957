/**
 * @guildhand/actions: action vocabulary, schemas and validation.
 */

export * from "./types";
export {
	type Action,
	type ActionList,
	type ActionOf,
	actionDefinitions,
	actionSchema,
	getActionDefinition,
	isActionKind,
	isDestructive,
	listActionDefinitions,
} from "./definitions";
export {
	type FieldIssue,
	type ValidationFailure,
	type ValidationResult,
	describeValidationFailure,
	parseAction,
	validate,
} from "./validate";
export { describeAction } from "./describe";
export { zodToJsonSchema } from "./helpers/schema";

import { type ActionDefinition, listActionDefinitions, zodToJsonSchema } from "@guildhand/actions";

const EXAMPLE_INSTRUCTION =
	"create a category called Gaming and a voice channel called Lobby inside it";
const EXAMPLE_OUTPUT = JSON.stringify([
	{ kind: "create_category", target: "Gaming" },
	{ kind: "create_channel", target: "Lobby", params: { type: "voice", category: "Gaming" } },
]);

function describeParams(definition: ActionDefinition): string {
	const schema = zodToJsonSchema(definition.params);
	const properties = schema.properties;
	if (
		typeof properties !== "object" ||
		properties === null ||
		Object.keys(properties).length === 0
	) {
		return "none";
	}
	return JSON.stringify(schema);
}

function describeDefinition(definition: ActionDefinition): string {
	const flag = definition.riskLevel === "destructive" ? " [destructive]" : "";
	return [
		`- ${definition.kind}${flag}: ${definition.description}`,
		`  target: ${definition.target}`,
		`  params: ${describeParams(definition)}`,
	].join("\n");
}

/**
 * System prompt listing every action kind with its params schema.
 */
export function buildSystemPrompt(
	definitions: ActionDefinition[] = listActionDefinitions(),
): string {
	return [
		"You are a Discord server administration command parser.",
		"Convert the administrator's instruction into a JSON array of actions.",
		'Each action is an object: {"kind": string, "target": string, "params": object}.',
		"",
		"ALLOWED ACTIONS:",
		...definitions.map(describeDefinition),
		"",
		"RULES:",
		"- Use only the kinds listed above.",
		"- List the actions in the order they must run. Create a category before the channels placed in it.",
		"- Refer to objects created earlier in the list by the name you gave them.",
		"- Respond with the JSON array only. No explanations, no markdown.",
		"",
		"EXAMPLE:",
		`Instruction: ${EXAMPLE_INSTRUCTION}`,
		EXAMPLE_OUTPUT,
	].join("\n");
}

export {
	ConfirmationCoordinator,
	type ConfirmationCoordinatorOptions,
	type ConfirmationPrompt,
	type ProposalResult,
	type ProposeInput,
	requiresConfirmation,
	type ResolutionResult,
	type ResolveInput,
} from "./coordinator";

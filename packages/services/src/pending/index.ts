export {
	InMemoryPendingActionStore,
	type PendingActionStore,
	type PendingEntry,
	type PutOptions,
	type TakeResult,
} from "./store";

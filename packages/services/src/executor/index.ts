export { ActionExecutor, type ActionExecutorOptions } from "./service";
export { CreatedObjects } from "./references";
export {
	type ActionOutcome,
	type ChannelSpec,
	type PermissionSubject,
	type PlatformAccess,
	PlatformError,
	type PlatformErrorCode,
	type RoleSpec,
} from "./types";

/**
 * @guildhand/services
 *
 * Instruction translation, confirmation and execution of admin actions.
 * Organized by feature; each module is platform-agnostic.
 */

// Feature modules
export * as authorization from "./authorization";
export * as confirmation from "./confirmation";
export * as executor from "./executor";
export * as inference from "./inference";
export * as pending from "./pending";
export * as summary from "./summary";
export * as translator from "./translator";

// Logger
export { setServicesLogger, getServicesLogger } from "./logger";

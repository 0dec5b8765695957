export { type AuthorizationResult, authorize } from "./guard";

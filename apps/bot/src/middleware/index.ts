export { ApiError, createErrorHandler, notFound } from "./error-handler";

export { DEFAULT_HUGGINGFACE_MODEL_URL, serverSchema } from "./schema";
export { getEnvStatus } from "./status";
export type { ServerSchema } from "./schema";
export type { EnvRequirement, EnvStatus } from "./status";

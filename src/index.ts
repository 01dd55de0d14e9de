export * from "./labels/index.js";
export * from "./orchestration/index.js";
export { MalformedInputError, OrganizeError } from "./types/errors.js";
export type { Logger } from "./types/logger.js";

export { loadConfig, AppConfigSchema, ProviderSchema, CONFIG_FILE_NAME } from "./config/app-config.js";
export type { AppConfig, LoadConfigOptions } from "./config/app-config.js";

export { createRagSystem } from "./bootstrap.js";
export type { RagDependencies, RagRuntime } from "./bootstrap.js";

export { createApp } from "./http/app.js";
export type { AppOptions, RagService } from "./http/app.js";

export { QueryRequestSchema } from "./http/schemas.js";
export type {
  QueryRequest,
  QueryResponseBody,
  CourseStatsBody,
  ClearSessionBody,
  ErrorBody,
  ValidationIssue,
} from "./http/schemas.js";

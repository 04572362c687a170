export { loadConfig, type AppConfig } from "./config.js";
export { makeLogger, type Logger, type LogLevel } from "./logger.js";
export { runPipeline, type RunOptions } from "./run.js";
export * from "./domain/types.js";
export * from "./domain/errors.js";
export type * from "./domain/providers.js";
export { type Result, ok, fail, attempt } from "./domain/result.js";
export { ArtifactNamer, DEFAULT_NAMING, formatTimestamp, mediaUri } from "./pipeline/artifact-namer.js";
export { readLines } from "./pipeline/line-source.js";
export { PipelineOrchestrator, type OrchestratorDeps, type PipelineSettings } from "./pipeline/orchestrator.js";
export { ResultSink } from "./pipeline/result-sink.js";
export { StagingArea, type StagedFile } from "./pipeline/staging.js";
export { makeProviders, type ProviderBundle } from "./providers/factory.js";

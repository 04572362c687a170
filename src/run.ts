import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { RunReport } from "./domain/types.js";
import { ArtifactNamer } from "./pipeline/artifact-namer.js";
import { readLines } from "./pipeline/line-source.js";
import { PipelineOrchestrator } from "./pipeline/orchestrator.js";
import { ResultSink } from "./pipeline/result-sink.js";
import { StagingArea } from "./pipeline/staging.js";
import { makeProviders, type ProviderBundle, voiceFor } from "./providers/factory.js";

export type RunOptions = {
  readonly providers?: ProviderBundle;
  readonly clock?: () => Date;
};

export async function runPipeline(
  config: AppConfig,
  logger: Logger,
  opts: RunOptions = {},
): Promise<RunReport> {
  const providers = opts.providers ?? makeProviders(config, logger);

  const orchestrator = new PipelineOrchestrator({
    logger,
    ...providers,
    namer: new ArtifactNamer({
      audioPrefix: config.audioNamePrefix,
      audioSuffix: config.audioNameSuffix,
      jobPrefix: config.jobNamePrefix,
      format: config.audioFormat,
    }),
    staging: new StagingArea(config.stagingDir, logger),
    settings: {
      bucket: config.bucket,
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      voice: voiceFor(config),
      format: config.audioFormat,
      transcribeLanguage: config.transcribeLanguage,
      mediaUriScheme: config.mediaUriScheme,
      publishKey: config.transcriptPublishKey,
    },
    clock: opts.clock,
  });

  logger.info("run started", { input: config.inputPath, output: config.outputPath, bucket: config.bucket });
  return orchestrator.run(readLines(config.inputPath), new ResultSink(config.outputPath, logger));
}

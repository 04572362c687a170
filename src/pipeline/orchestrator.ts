import type { Logger } from "../logger.js";
import type {
  ObjectStore,
  SpeechSynthesisProvider,
  TranscriptionSubmitter,
  TranslationProvider,
} from "../domain/providers.js";
import type {
  AudioArtifact,
  AudioFormat,
  LanguageCode,
  RecordOutcome,
  RunFailure,
  RunReport,
  StageLatencies,
  TextRecord,
  TranscriptionJob,
} from "../domain/types.js";
import type { PipelineError } from "../domain/errors.js";
import { attempt, fail, ok, type Result } from "../domain/result.js";
import { type ArtifactNamer, contentTypeForFormat, mediaUri } from "./artifact-namer.js";
import type { ResultSink } from "./result-sink.js";
import type { StagingArea } from "./staging.js";

export type PipelineSettings = {
  readonly bucket: string;
  readonly sourceLanguage: LanguageCode;
  readonly targetLanguage: LanguageCode;
  readonly voice: string;
  readonly format: AudioFormat;
  readonly transcribeLanguage: LanguageCode;
  readonly mediaUriScheme: string;
  readonly publishKey?: string;
};

export type OrchestratorDeps = {
  readonly logger: Logger;
  readonly translator: TranslationProvider;
  readonly speech: SpeechSynthesisProvider;
  readonly store: ObjectStore;
  readonly transcriber: TranscriptionSubmitter;
  readonly namer: ArtifactNamer;
  readonly staging: StagingArea;
  readonly settings: PipelineSettings;
  readonly clock?: () => Date;
};

type RecordFailure = {
  readonly error: PipelineError;
  readonly recordIndex?: number;
};

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function toFailure({ error, recordIndex }: RecordFailure): RunFailure {
  return { stage: error.stage, recordIndex, message: error.message };
}

/**
 * Drives each non-blank input line through translate, synthesize, store and
 * submit, one record at a time. The first failing stage ends the run; no later
 * record is attempted.
 */
export class PipelineOrchestrator {
  public constructor(private readonly deps: OrchestratorDeps) {}

  public async run(lines: AsyncIterable<string>, sink: ResultSink): Promise<RunReport> {
    const outcomes: RecordOutcome[] = [];

    const collected = await this.collectRecords(lines);
    if (!collected.ok) {
      return this.finish(sink, outcomes, 0, { error: collected.error }, false);
    }
    const { records, skippedBlank } = collected.value;

    const opened = await attempt("io", "failed to open output file", () => sink.open());
    if (!opened.ok) {
      return this.finish(sink, outcomes, skippedBlank, { error: opened.error }, false);
    }

    for (const record of records) {
      const outcome: RecordOutcome = { index: record.index, state: "start", latencies: {} };
      outcomes.push(outcome);

      const processed = await this.processRecord(record, sink, outcome);
      if (!processed.ok) {
        outcome.state = "failed";
        return this.finish(
          sink,
          outcomes,
          skippedBlank,
          { error: processed.error, recordIndex: record.index },
          true,
        );
      }
      outcome.state = "done";
    }

    return this.finish(sink, outcomes, skippedBlank, undefined, true);
  }

  private async collectRecords(
    lines: AsyncIterable<string>,
  ): Promise<Result<{ records: TextRecord[]; skippedBlank: number }>> {
    return attempt("io", "failed to read input", async () => {
      const records: TextRecord[] = [];
      let index = 0;
      let skippedBlank = 0;
      for await (const text of lines) {
        if (isBlank(text)) {
          skippedBlank += 1;
        } else {
          records.push({ index, text });
        }
        index += 1;
      }
      return { records, skippedBlank };
    });
  }

  private async processRecord(
    record: TextRecord,
    sink: ResultSink,
    outcome: RecordOutcome,
  ): Promise<Result<void>> {
    const { settings } = this.deps;

    const translated = await this.timed(outcome, "translateMs", () =>
      attempt("translate", "translation failed", () =>
        this.deps.translator.translate(record.text, settings.sourceLanguage, settings.targetLanguage),
      ),
    );
    if (!translated.ok) return fail(translated.error);

    outcome.translation = {
      index: record.index,
      sourceText: record.text,
      translatedText: translated.value,
      sourceLanguage: settings.sourceLanguage,
      targetLanguage: settings.targetLanguage,
    };
    outcome.state = "translated";
    sink.append(translated.value);
    this.deps.logger.info("translated text", { record: record.index, text: translated.value });

    const stored = await this.synthesizeAndStore(translated.value, outcome);
    if (!stored.ok) return fail(stored.error);

    const submitted = await this.timed(outcome, "submitMs", () => this.submitTranscription(stored.value));
    if (!submitted.ok) return fail(submitted.error);

    outcome.job = submitted.value;
    outcome.state = "submitted";
    this.deps.logger.info("transcription job started", {
      record: record.index,
      jobName: submitted.value.jobName,
    });
    return ok(undefined);
  }

  private async synthesizeAndStore(text: string, outcome: RecordOutcome): Promise<Result<AudioArtifact>> {
    const { settings, staging } = this.deps;
    const name = this.deps.namer.nextAudioName(this.now());

    // Materialize then transmit: the synthesized stream is single-pass.
    const staged = await this.timed(outcome, "synthesizeMs", () =>
      attempt("synthesize", "speech synthesis failed", async () => {
        const audio = await this.deps.speech.synthesize(text, settings.voice, settings.format);
        return staging.materialize(name, audio);
      }),
    );
    if (!staged.ok) return fail(staged.error);
    outcome.state = "synthesized";

    let uploaded: Result<AudioArtifact>;
    try {
      uploaded = await this.timed(outcome, "storeMs", () =>
        attempt("store", "upload failed", async () => {
          const body = await staging.read(staged.value);
          await this.deps.store.put(settings.bucket, name, body, contentTypeForFormat(settings.format));
          return {
            name,
            format: settings.format,
            bucket: settings.bucket,
            key: name,
            sizeBytes: body.byteLength,
            stagingPath: staged.value.path,
          };
        }),
      );
    } finally {
      const cleanupError = await staging.release(staged.value);
      if (cleanupError) outcome.stagingCleanupError = cleanupError;
    }
    if (!uploaded.ok) return uploaded;

    outcome.artifact = uploaded.value;
    outcome.state = "uploaded";
    this.deps.logger.info("uploaded audio file", { bucket: settings.bucket, key: name });
    return uploaded;
  }

  private async submitTranscription(artifact: AudioArtifact): Promise<Result<TranscriptionJob>> {
    const { settings } = this.deps;
    return attempt("submit", "transcription submission failed", () =>
      this.deps.transcriber.submit({
        jobName: this.deps.namer.nextJobName(this.now()),
        mediaUri: mediaUri(settings.mediaUriScheme, artifact.bucket, artifact.key),
        languageCode: settings.transcribeLanguage,
        mediaFormat: artifact.format,
        outputBucket: settings.bucket,
      }),
    );
  }

  private async finish(
    sink: ResultSink,
    records: RecordOutcome[],
    skippedBlank: number,
    failure: RecordFailure | undefined,
    sinkOpened: boolean,
  ): Promise<RunReport> {
    let runFailure = failure;
    let publishedKey: string | undefined;

    if (!runFailure) {
      const flushed = await attempt("io", "failed to flush output", () => sink.flush());
      if (!flushed.ok) {
        runFailure = { error: flushed.error };
      } else if (this.deps.settings.publishKey) {
        const published = await this.publish(sink, this.deps.settings.publishKey);
        if (published.ok) {
          publishedKey = published.value;
        } else {
          runFailure = { error: published.error };
        }
      }
    }
    if (runFailure) {
      this.deps.logger.error(`${runFailure.error.stage} failed`, {
        record: runFailure.recordIndex,
        error: runFailure.error.message,
      });
    }

    const sinkCleanupError = sinkOpened ? await sink.dispose() : undefined;

    const report: RunReport = {
      status: runFailure ? "failed" : "completed",
      records,
      skippedBlank,
      outputPath: sink.path,
      failure: runFailure ? toFailure(runFailure) : undefined,
      publishedKey,
      sinkCleanupError,
    };
    this.deps.logger.info("run finished", {
      status: report.status,
      records: records.length,
      skippedBlank,
    });
    return report;
  }

  private async publish(sink: ResultSink, key: string): Promise<Result<string>> {
    const { bucket } = this.deps.settings;
    return attempt("store", "failed to publish output file", async () => {
      const body = await sink.contents();
      await this.deps.store.put(bucket, key, body, "text/plain; charset=utf-8");
      this.deps.logger.info("uploaded text file", { bucket, key });
      return key;
    });
  }

  private async timed<T>(
    outcome: RecordOutcome,
    field: keyof StageLatencies,
    run: () => Promise<T>,
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      return await run();
    } finally {
      outcome.latencies = { ...outcome.latencies, [field]: Date.now() - startedAt };
    }
  }

  private now(): Date {
    return this.deps.clock?.() ?? new Date();
  }
}

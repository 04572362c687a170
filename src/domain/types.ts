export type LanguageCode = string;

export type AudioFormat = "mp3" | "ogg_vorbis";

export type PipelineStage = "io" | "translate" | "synthesize" | "store" | "submit";

export type RecordState =
  | "start"
  | "translated"
  | "synthesized"
  | "uploaded"
  | "submitted"
  | "done"
  | "failed";

export interface TextRecord {
  readonly index: number;
  readonly text: string;
}

export interface TranslatedRecord {
  readonly index: number;
  readonly sourceText: string;
  readonly translatedText: string;
  readonly sourceLanguage: LanguageCode;
  readonly targetLanguage: LanguageCode;
}

export interface AudioArtifact {
  readonly name: string;
  readonly format: AudioFormat;
  readonly bucket: string;
  readonly key: string;
  readonly sizeBytes: number;
  readonly stagingPath: string;
}

export interface TranscriptionRequest {
  readonly jobName: string;
  readonly mediaUri: string;
  readonly languageCode: LanguageCode;
  readonly mediaFormat: AudioFormat;
  readonly outputBucket: string;
}

export interface TranscriptionJob extends TranscriptionRequest {
  readonly status?: string;
}

export interface ObjectAck {
  readonly bucket: string;
  readonly key: string;
  readonly etag?: string;
}

export interface StageLatencies {
  readonly translateMs?: number;
  readonly synthesizeMs?: number;
  readonly storeMs?: number;
  readonly submitMs?: number;
}

export interface RecordOutcome {
  readonly index: number;
  state: RecordState;
  translation?: TranslatedRecord;
  artifact?: AudioArtifact;
  job?: TranscriptionJob;
  stagingCleanupError?: string;
  latencies: StageLatencies;
}

export interface RunFailure {
  readonly stage: PipelineStage;
  readonly recordIndex?: number;
  readonly message: string;
}

export interface RunReport {
  readonly status: "completed" | "failed";
  readonly records: RecordOutcome[];
  readonly skippedBlank: number;
  readonly outputPath: string;
  readonly failure?: RunFailure;
  readonly publishedKey?: string;
  readonly sinkCleanupError?: string;
}

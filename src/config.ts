import type { AudioFormat } from "./domain/types.js";
import type { LogLevel } from "./logger.js";

export type TranslationBackend = "aws" | "google";
export type TtsBackend = "polly" | "google";

export interface AppConfig {
  readonly logLevel: LogLevel;
  readonly awsRegion: string;
  readonly bucket: string;
  readonly sourceLanguage: string;
  readonly targetLanguage: string;
  readonly voice: string;
  readonly audioFormat: AudioFormat;
  readonly transcribeLanguage: string;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly stagingDir: string;
  readonly audioNamePrefix: string;
  readonly audioNameSuffix: string;
  readonly jobNamePrefix: string;
  readonly mediaUriScheme: string;
  readonly transcriptPublishKey?: string;
  readonly translationProvider: TranslationBackend;
  readonly ttsProvider: TtsBackend;
  readonly googleCloudApiKey?: string;
  readonly googleTtsVoice: string;
  readonly dryRun: boolean;
  readonly localStoreDir: string;
}

function oneOf<T extends string>(name: string, value: string, allowed: readonly T[]): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Invalid ${name}: ${value} (expected one of ${allowed.join(", ")})`);
  }
  return match;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const logLevel = oneOf("LOG_LEVEL", env.LOG_LEVEL ?? "info", [
    "debug",
    "info",
    "warn",
    "error",
  ] as const);
  const audioFormat = oneOf("AUDIO_FORMAT", env.AUDIO_FORMAT ?? "mp3", ["mp3", "ogg_vorbis"] as const);
  const translationProvider = oneOf("TRANSLATION_PROVIDER", env.TRANSLATION_PROVIDER ?? "aws", [
    "aws",
    "google",
  ] as const);
  const ttsProvider = oneOf("TTS_PROVIDER", env.TTS_PROVIDER ?? "polly", ["polly", "google"] as const);
  const dryRun = env.SPEECHLINE_DRY_RUN === "1";

  const bucket = nonEmpty(env.SPEECHLINE_BUCKET) ?? (dryRun ? "speechline-dry-run" : undefined);
  if (!bucket) {
    throw new Error("Invalid SPEECHLINE_BUCKET: a bucket is required unless SPEECHLINE_DRY_RUN=1");
  }

  const googleCloudApiKey = nonEmpty(env.GOOGLE_CLOUD_API_KEY);
  if (!dryRun && !googleCloudApiKey && (translationProvider === "google" || ttsProvider === "google")) {
    throw new Error("Invalid GOOGLE_CLOUD_API_KEY: required by the google providers");
  }

  return {
    logLevel,
    awsRegion: env.AWS_REGION ?? "ap-northeast-1",
    bucket,
    sourceLanguage: env.SOURCE_LANGUAGE ?? "ja",
    targetLanguage: env.TARGET_LANGUAGE ?? "en",
    voice: env.POLLY_VOICE ?? "Joanna",
    audioFormat,
    transcribeLanguage: env.TRANSCRIBE_LANGUAGE ?? "en-US",
    inputPath: env.INPUT_PATH ?? "./input.txt",
    outputPath: env.OUTPUT_PATH ?? "translated_text.txt",
    stagingDir: env.STAGING_DIR ?? ".",
    audioNamePrefix: env.AUDIO_NAME_PREFIX ?? "audioFile",
    audioNameSuffix: env.AUDIO_NAME_SUFFIX ?? "output",
    jobNamePrefix: env.JOB_NAME_PREFIX ?? "transcription-job",
    mediaUriScheme: env.MEDIA_URI_SCHEME ?? "s3",
    transcriptPublishKey: nonEmpty(env.TRANSCRIPT_PUBLISH_KEY),
    translationProvider,
    ttsProvider,
    googleCloudApiKey,
    googleTtsVoice: env.GOOGLE_TTS_VOICE ?? "en-US-Standard-C",
    dryRun,
    localStoreDir: env.LOCAL_STORE_DIR ?? ".speechline-store",
  };
}

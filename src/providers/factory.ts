import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type {
  ObjectStore,
  SpeechSynthesisProvider,
  TranscriptionSubmitter,
  TranslationProvider,
} from "../domain/providers.js";
import { LocalObjectStore } from "./storage/local.js";
import { S3ObjectStore } from "./storage/s3.js";
import { AwsTranscriptionSubmitter, StubTranscriptionSubmitter } from "./transcription/aws.js";
import { AwsTranslationProvider, StubTranslationProvider } from "./translation/aws.js";
import { GoogleTranslationProvider } from "./translation/google.js";
import { GoogleTtsProvider } from "./tts/google.js";
import { PollySpeechProvider, StubSpeechProvider } from "./tts/polly.js";

export type ProviderBundle = {
  readonly translator: TranslationProvider;
  readonly speech: SpeechSynthesisProvider;
  readonly store: ObjectStore;
  readonly transcriber: TranscriptionSubmitter;
};

export function voiceFor(config: AppConfig): string {
  return config.ttsProvider === "google" ? config.googleTtsVoice : config.voice;
}

export function makeProviders(config: AppConfig, logger: Logger): ProviderBundle {
  let bundle: ProviderBundle;

  if (config.dryRun) {
    bundle = {
      translator: new StubTranslationProvider(),
      speech: new StubSpeechProvider(),
      store: new LocalObjectStore(config.localStoreDir),
      transcriber: new StubTranscriptionSubmitter(),
    };
  } else {
    const apiKey = config.googleCloudApiKey ?? "";
    bundle = {
      translator:
        config.translationProvider === "google"
          ? new GoogleTranslationProvider({ apiKey })
          : AwsTranslationProvider.forRegion(config.awsRegion),
      speech:
        config.ttsProvider === "google"
          ? new GoogleTtsProvider({ apiKey })
          : PollySpeechProvider.forRegion(config.awsRegion),
      store: S3ObjectStore.forRegion(config.awsRegion),
      transcriber: AwsTranscriptionSubmitter.forRegion(config.awsRegion),
    };
  }

  logger.info("provider selection", {
    translation: bundle.translator.name,
    tts: bundle.speech.name,
    storage: bundle.store.name,
    transcription: bundle.transcriber.name,
    region: config.awsRegion,
  });

  return bundle;
}

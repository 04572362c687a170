import type {
  AudioFormat,
  LanguageCode,
  ObjectAck,
  TranscriptionJob,
  TranscriptionRequest,
} from "./types.js";

export type AudioStream = AsyncIterable<Uint8Array>;

export interface TranslationProvider {
  readonly name: string;
  translate(text: string, sourceLanguage: LanguageCode, targetLanguage: LanguageCode): Promise<string>;
}

export interface SpeechSynthesisProvider {
  readonly name: string;
  synthesize(text: string, voice: string, format: AudioFormat): Promise<AudioStream>;
}

export interface ObjectStore {
  readonly name: string;
  put(bucket: string, key: string, content: Buffer, contentType: string): Promise<ObjectAck>;
}

export interface TranscriptionSubmitter {
  readonly name: string;
  submit(request: TranscriptionRequest): Promise<TranscriptionJob>;
}

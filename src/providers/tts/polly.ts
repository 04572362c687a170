import {
  PollyClient,
  SynthesizeSpeechCommand,
  VoiceId,
} from "@aws-sdk/client-polly";
import type { AudioStream, SpeechSynthesisProvider } from "../../domain/providers.js";
import type { AudioFormat } from "../../domain/types.js";
import { SynthesisError } from "../../domain/errors.js";

// Only the audio payload is read back, so fakes need not build a full SDK stream.
export type PollySender = {
  send(command: SynthesizeSpeechCommand): Promise<{ readonly AudioStream?: unknown }>;
};

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

function hasByteArray(value: unknown): value is { transformToByteArray: () => Promise<Uint8Array> } {
  return (
    typeof value === "object" &&
    value !== null &&
    "transformToByteArray" in value &&
    typeof value.transformToByteArray === "function"
  );
}

async function* single(read: () => Promise<Uint8Array>): AudioStream {
  yield await read();
}

export function toAudioStream(audioStream: unknown): AudioStream | undefined {
  // Node runtimes hand back a Readable; browser-style payloads only expose the byte helpers.
  if (isAsyncIterable(audioStream)) return audioStream;
  if (hasByteArray(audioStream)) {
    const payload = audioStream;
    return single(() => payload.transformToByteArray());
  }
  return undefined;
}

const VOICES: ReadonlySet<string> = new Set(Object.values(VoiceId));

function isVoiceId(voice: string): voice is VoiceId {
  return VOICES.has(voice);
}

export class StubSpeechProvider implements SpeechSynthesisProvider {
  public readonly name = "speech-stub";

  public async synthesize(text: string): Promise<AudioStream> {
    return single(async () => Buffer.from(`stub-audio:${text}`, "utf8"));
  }
}

export class PollySpeechProvider implements SpeechSynthesisProvider {
  public readonly name = "aws-polly";

  public constructor(private readonly client: PollySender) {}

  public static forRegion(region: string): PollySpeechProvider {
    return new PollySpeechProvider(new PollyClient({ region }));
  }

  public async synthesize(text: string, voice: string, format: AudioFormat): Promise<AudioStream> {
    if (!isVoiceId(voice)) {
      throw new SynthesisError(`unsupported polly voice: ${voice}`);
    }

    let out: { readonly AudioStream?: unknown };
    try {
      out = await this.client.send(
        new SynthesizeSpeechCommand({
          Text: text,
          TextType: "text",
          OutputFormat: format,
          VoiceId: voice,
        }),
      );
    } catch (error) {
      throw new SynthesisError(`polly synthesis with voice ${voice} failed`, error);
    }

    const stream = toAudioStream(out.AudioStream);
    if (!stream) {
      throw new SynthesisError("polly returned no audio stream");
    }
    return stream;
  }
}

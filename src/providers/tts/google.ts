import type { AudioStream, SpeechSynthesisProvider } from "../../domain/providers.js";
import type { AudioFormat } from "../../domain/types.js";
import { SynthesisError } from "../../domain/errors.js";

type GoogleTtsOptions = {
  readonly apiKey: string;
  readonly endpoint?: string;
};

type GoogleTtsResponse = {
  audioContent?: string;
  error?: { message?: string };
};

async function* fromBuffer(audio: Buffer): AudioStream {
  yield audio;
}

export class GoogleTtsProvider implements SpeechSynthesisProvider {
  public readonly name = "google-tts";

  public constructor(private readonly opts: GoogleTtsOptions) {}

  public async synthesize(text: string, voice: string, format: AudioFormat): Promise<AudioStream> {
    if (format !== "mp3") {
      throw new SynthesisError(`google tts cannot produce ${format}`);
    }
    const languageCode = voice.split("-").slice(0, 2).join("-");

    const payload = {
      input: { text },
      voice: { languageCode, name: voice },
      audioConfig: { audioEncoding: "MP3" },
    };

    let response: Response;
    try {
      response = await fetch(
        this.opts.endpoint ??
          `https://texttospeech.googleapis.com/v1/text:synthesize?key=${encodeURIComponent(
            this.opts.apiKey,
          )}`,
        {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify(payload),
        },
      );
    } catch (error) {
      throw new SynthesisError("google tts request failed", error);
    }

    let body: GoogleTtsResponse;
    try {
      body = (await response.json()) as GoogleTtsResponse;
    } catch (error) {
      throw new SynthesisError(`google tts returned unreadable body (${response.status})`, error);
    }

    if (!response.ok) {
      throw new SynthesisError(
        `google tts rejected request (${response.status}): ${body.error?.message ?? "unknown error"}`,
      );
    }
    if (!body.audioContent) {
      throw new SynthesisError("google tts returned no audio");
    }

    return fromBuffer(Buffer.from(body.audioContent, "base64"));
  }
}

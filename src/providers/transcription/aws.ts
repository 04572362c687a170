import {
  LanguageCode as TranscribeLanguageCode,
  type MediaFormat,
  StartTranscriptionJobCommand,
  type StartTranscriptionJobCommandOutput,
  TranscribeClient,
} from "@aws-sdk/client-transcribe";
import type { TranscriptionSubmitter } from "../../domain/providers.js";
import type { AudioFormat, TranscriptionJob, TranscriptionRequest } from "../../domain/types.js";
import { SubmissionError } from "../../domain/errors.js";

export type TranscribeSender = {
  send(command: StartTranscriptionJobCommand): Promise<StartTranscriptionJobCommandOutput>;
};

const MEDIA_FORMATS: Record<AudioFormat, MediaFormat> = {
  mp3: "mp3",
  ogg_vorbis: "ogg",
};

const LANGUAGE_CODES: ReadonlySet<string> = new Set(Object.values(TranscribeLanguageCode));

function isTranscribeLanguage(code: string): code is TranscribeLanguageCode {
  return LANGUAGE_CODES.has(code);
}

export class StubTranscriptionSubmitter implements TranscriptionSubmitter {
  public readonly name = "transcribe-stub";

  public async submit(request: TranscriptionRequest): Promise<TranscriptionJob> {
    return { ...request, status: "QUEUED" };
  }
}

export class AwsTranscriptionSubmitter implements TranscriptionSubmitter {
  public readonly name = "aws-transcribe";

  public constructor(private readonly client: TranscribeSender) {}

  public static forRegion(region: string): AwsTranscriptionSubmitter {
    return new AwsTranscriptionSubmitter(new TranscribeClient({ region }));
  }

  public async submit(request: TranscriptionRequest): Promise<TranscriptionJob> {
    const languageCode = request.languageCode;
    if (!isTranscribeLanguage(languageCode)) {
      throw new SubmissionError(`unsupported transcription language: ${languageCode}`);
    }

    let out: StartTranscriptionJobCommandOutput;
    try {
      out = await this.client.send(
        new StartTranscriptionJobCommand({
          TranscriptionJobName: request.jobName,
          LanguageCode: languageCode,
          MediaFormat: MEDIA_FORMATS[request.mediaFormat],
          Media: { MediaFileUri: request.mediaUri },
          OutputBucketName: request.outputBucket,
        }),
      );
    } catch (error) {
      throw new SubmissionError(`start transcription job ${request.jobName} failed`, error);
    }

    return { ...request, status: out.TranscriptionJob?.TranscriptionJobStatus };
  }
}

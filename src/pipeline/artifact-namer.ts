import type { AudioFormat } from "../domain/types.js";

export type NamingOptions = {
  readonly audioPrefix: string;
  readonly audioSuffix: string;
  readonly jobPrefix: string;
  readonly format: AudioFormat;
};

export const DEFAULT_NAMING: NamingOptions = {
  audioPrefix: "audioFile",
  audioSuffix: "output",
  jobPrefix: "transcription-job",
  format: "mp3",
};

const EXTENSIONS: Record<AudioFormat, string> = {
  mp3: "mp3",
  ogg_vorbis: "ogg",
};

export function extensionForFormat(format: AudioFormat): string {
  return EXTENSIONS[format];
}

export function contentTypeForFormat(format: AudioFormat): string {
  return format === "mp3" ? "audio/mpeg" : "audio/ogg";
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local wall-clock time as YYYYMMDDHHMMSS. */
export function formatTimestamp(now: Date): string {
  return (
    pad(now.getFullYear(), 4) +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds())
  );
}

/**
 * Names audio objects and transcription jobs from a timestamp truncated to the
 * second. Two calls inside the same second return the same name.
 */
export class ArtifactNamer {
  public constructor(private readonly opts: NamingOptions = DEFAULT_NAMING) {}

  public nextAudioName(now: Date): string {
    const ext = extensionForFormat(this.opts.format);
    return `${this.opts.audioPrefix}-${formatTimestamp(now)}-${this.opts.audioSuffix}.${ext}`;
  }

  public nextJobName(now: Date): string {
    return `${this.opts.jobPrefix}-${formatTimestamp(now)}`;
  }
}

export function mediaUri(scheme: string, bucket: string, key: string): string {
  return `${scheme}://${bucket}/${key}`;
}

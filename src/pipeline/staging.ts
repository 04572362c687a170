import { createWriteStream } from "node:fs";
import { mkdir, readFile, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { AudioStream } from "../domain/providers.js";
import { describeCause, IoError, SynthesisError } from "../domain/errors.js";
import type { Logger } from "../logger.js";

export type StagedFile = {
  readonly path: string;
  readonly sizeBytes: number;
};

// Failures pulled from the audio source belong to synthesis, not to the local disk.
async function* fromSynthesis(audio: AudioStream): AudioStream {
  try {
    for await (const chunk of audio) yield chunk;
  } catch (error) {
    throw new SynthesisError("audio stream broke while draining", error);
  }
}

/**
 * Local scratch space for synthesized audio. Synthesis hands back a
 * forward-only stream while the upload needs the bytes again by length, so the
 * stream is drained to a file first and the file is read back for upload.
 */
export class StagingArea {
  public constructor(
    private readonly directory: string,
    private readonly logger: Logger,
  ) {}

  public async materialize(name: string, audio: AudioStream): Promise<StagedFile> {
    const path = join(this.directory, name);
    try {
      await mkdir(this.directory, { recursive: true });
      await pipeline(Readable.from(fromSynthesis(audio)), createWriteStream(path));
      const info = await stat(path);
      this.logger.debug("staged audio", { path, sizeBytes: info.size });
      return { path, sizeBytes: info.size };
    } catch (error) {
      await this.discard(path);
      if (error instanceof SynthesisError) throw error;
      throw new IoError(`failed to stage audio at ${path}`, error);
    }
  }

  private async discard(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      this.logger.warn("failed to discard partial audio file", { path, error: describeCause(error) });
    }
  }

  public async read(file: StagedFile): Promise<Buffer> {
    try {
      return await readFile(file.path);
    } catch (error) {
      throw new IoError(`failed to read staged audio ${file.path}`, error);
    }
  }

  /** Deletes the staged copy. Returns the failure message instead of throwing. */
  public async release(file: StagedFile): Promise<string | undefined> {
    try {
      await rm(file.path);
      this.logger.info("deleted local audio file", { path: file.path });
      return undefined;
    } catch (error) {
      const message = describeCause(error);
      this.logger.warn("failed to delete local audio file", { path: file.path, error: message });
      return message;
    }
  }
}

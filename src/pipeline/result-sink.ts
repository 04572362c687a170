import { readFile, rm, writeFile } from "node:fs/promises";
import { describeCause, IoError } from "../domain/errors.js";
import type { Logger } from "../logger.js";

/**
 * Append-only collection of translated lines for one run. The local file is
 * created empty when the run opens the sink, written on flush and removed on
 * dispose.
 */
export class ResultSink {
  private readonly lines: string[] = [];

  public constructor(
    public readonly path: string,
    private readonly logger: Logger,
  ) {}

  public async open(): Promise<void> {
    try {
      await writeFile(this.path, "");
    } catch (error) {
      throw new IoError(`failed to create output file ${this.path}`, error);
    }
  }

  public append(line: string): void {
    this.lines.push(line);
  }

  public get entries(): readonly string[] {
    return this.lines;
  }

  public async flush(): Promise<void> {
    const body = this.lines.map((line) => `${line}\n`).join("");
    try {
      await writeFile(this.path, body, "utf8");
    } catch (error) {
      throw new IoError(`failed to write output file ${this.path}`, error);
    }
  }

  public async contents(): Promise<Buffer> {
    try {
      return await readFile(this.path);
    } catch (error) {
      throw new IoError(`failed to read output file ${this.path}`, error);
    }
  }

  public async dispose(): Promise<string | undefined> {
    try {
      await rm(this.path);
      this.logger.info("deleted local text file", { path: this.path });
      return undefined;
    } catch (error) {
      const message = describeCause(error);
      this.logger.error("failed to delete local text file", { path: this.path, error: message });
      return message;
    }
  }
}

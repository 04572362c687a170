import type { PipelineStage } from "./types.js";

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export class PipelineError extends Error {
  public constructor(
    message: string,
    public readonly stage: PipelineStage,
    cause?: unknown,
  ) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = "PipelineError";
    Object.setPrototypeOf(this, PipelineError.prototype);
  }
}

export class IoError extends PipelineError {
  public constructor(message: string, cause?: unknown) {
    super(message, "io", cause);
    this.name = "IoError";
    Object.setPrototypeOf(this, IoError.prototype);
  }
}

export class TranslationError extends PipelineError {
  public constructor(message: string, cause?: unknown) {
    super(message, "translate", cause);
    this.name = "TranslationError";
    Object.setPrototypeOf(this, TranslationError.prototype);
  }
}

export class SynthesisError extends PipelineError {
  public constructor(message: string, cause?: unknown) {
    super(message, "synthesize", cause);
    this.name = "SynthesisError";
    Object.setPrototypeOf(this, SynthesisError.prototype);
  }
}

export class StorageError extends PipelineError {
  public constructor(message: string, cause?: unknown) {
    super(message, "store", cause);
    this.name = "StorageError";
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export class SubmissionError extends PipelineError {
  public constructor(message: string, cause?: unknown) {
    super(message, "submit", cause);
    this.name = "SubmissionError";
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}

export function errorForStage(stage: PipelineStage, message: string, cause?: unknown): PipelineError {
  switch (stage) {
    case "io":
      return new IoError(message, cause);
    case "translate":
      return new TranslationError(message, cause);
    case "synthesize":
      return new SynthesisError(message, cause);
    case "store":
      return new StorageError(message, cause);
    case "submit":
      return new SubmissionError(message, cause);
  }
}

import { errorForStage, PipelineError } from "./errors.js";
import type { PipelineStage } from "./types.js";

export type Result<T, E = PipelineError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// Runs one stage and folds any rejection into a failure tagged with that stage.
export async function attempt<T>(
  stage: PipelineStage,
  message: string,
  run: () => Promise<T>,
): Promise<Result<T>> {
  try {
    return ok(await run());
  } catch (error) {
    if (error instanceof PipelineError) return fail(error);
    return fail(errorForStage(stage, message, error));
  }
}

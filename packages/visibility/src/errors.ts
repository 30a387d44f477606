import { CoreError } from "@framevis/core";
import type {
  FrameVisibilityErrorCode,
  FrameVisibilityFailure,
  MutationResult,
  StateRecord,
} from "./types";

export class FrameVisibilityError extends CoreError {
  declare readonly code: FrameVisibilityErrorCode;

  constructor(code: FrameVisibilityErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, { context });
    this.name = "FrameVisibilityError";
  }

  static fromFailure(failure: FrameVisibilityFailure): FrameVisibilityError {
    return new FrameVisibilityError(failure.code, failure.message);
  }
}

export function failure(
  code: FrameVisibilityErrorCode,
  message: string
): { ok: false; error: FrameVisibilityFailure } {
  return { ok: false, error: { code, message } };
}

/** Return the records of a successful mutation, or throw its failure */
export function unwrapResult<T>(result: MutationResult<T>): readonly StateRecord<T>[] {
  if (!result.ok) {
    throw FrameVisibilityError.fromFailure(result.error);
  }
  return result.records;
}

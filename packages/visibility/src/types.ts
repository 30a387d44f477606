/**
 * Frame-Visibility Types
 *
 * A primitive overlaid on a multi-frame dataset owns an ordered sequence of state records.
 * Each record carries an opaque payload and a frame association deciding where it is visible.
 */

import type { observability } from "@framevis/core";
import type { DevAssertionsConfig } from "./devAssertions";

// ============================================================================
// Frame Associations
// ============================================================================

/** Visible in every frame */
export type UbiquitousAssociation = { kind: "ubiquitous" };

/** Visible in every frame except `frame` */
export type AvoidingAssociation = { kind: "avoiding"; frame: number };

/** Visible only in `frame` */
export type SingleFrameAssociation = { kind: "single"; frame: number };

export type FrameAssociation = UbiquitousAssociation | AvoidingAssociation | SingleFrameAssociation;

export type FrameAssociationKind = FrameAssociation["kind"];

/**
 * Signed-integer request form used by editing code:
 * `null` is ubiquitous, `n >= 0` is single frame `n`, `n < 0` avoids frame `-n - 1`.
 */
export type SignedFrameRequest = number | null;

/** Anything `reassign` and `addState` accept as the new association */
export type AssociationRequest = FrameAssociation | SignedFrameRequest;

// ============================================================================
// State Records
// ============================================================================

export type StateRecord<T> = {
  readonly id: string;
  readonly payload: T;
  readonly association: FrameAssociation;
};

/** A record id, or its position in the sequence */
export type RecordRef = string | number;

// ============================================================================
// Dataset Capability
// ============================================================================

/** The dataset the primitive is overlaid on. Only consulted to enumerate frames. */
export interface FrameDataset {
  /** Dataset identifier used in log context */
  readonly id?: string;
  /** Valid frame indices; any order, duplicates allowed */
  validFrameIndices(): Iterable<number>;
}

// ============================================================================
// Results & Errors
// ============================================================================

export type FrameVisibilityErrorCode = "INVALID_TARGET" | "MALFORMED_ASSOCIATION" | "INVALID_FRAME";

export type FrameVisibilityFailure = {
  code: FrameVisibilityErrorCode;
  message: string;
};

export type MutationResult<T> =
  | {
      ok: true;
      records: readonly StateRecord<T>[];
      /** The record the call acted on, as it is after the call (or as it was, when removed) */
      record: StateRecord<T>;
    }
  | { ok: false; error: FrameVisibilityFailure };

// ============================================================================
// Engine
// ============================================================================

export type FrameVisibilityConfig<T> = {
  dataset: FrameDataset;
  /** Annotation primitive identifier used in log context and record ids */
  primitiveId?: string;
  /** When given, the sequence starts with one ubiquitous record holding this payload */
  initialPayload?: T;
  /** Copies a payload for each record materialized by expansion; defaults to sharing it */
  clonePayload?: (payload: T) => T;
  /** Record id prefix; defaults to "rec" */
  idPrefix?: string;
  /** Defaults to the `dev_assertions` feature flag, throwing on failure */
  devAssertions?: Partial<DevAssertionsConfig>;
  logger?: observability.StructuredLogger;
};

/** Valid frames reported by a dataset notification */
export type FramesChange = { kind: "added"; frames: number[] } | { kind: "removed"; frames: number[] };

export type FrameVisibilityEvents<T> = {
  recordsChange: (records: readonly StateRecord<T>[]) => void;
  frameChange: (frame: number) => void;
  framesChange: (change: FramesChange) => void;
};

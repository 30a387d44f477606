/**
 * Frame-Visibility Engine
 *
 * Decides which state record of an annotation primitive is visible in each frame of a
 * multi-frame dataset, and keeps the record sequence consistent while associations are edited.
 */

// Types
export * from "./types";

// Associations
export {
  FrameAssociationSchema,
  FrameIndexSchema,
  SignedFrameRequestSchema,
  associationsEqual,
  avoiding,
  formatAssociation,
  fromSignedFrame,
  isValidFrame,
  isVisibleIn,
  parseAssociationRequest,
  singleFrame,
  toSignedFrame,
  ubiquitous,
  type AssociationParseResult,
} from "./association";

// Dataset capability
export {
  createFrameRangeDataset,
  createStaticDataset,
  enumerateFrames,
  readFrames,
  type FrameListing,
} from "./dataset";

// Errors
export { FrameVisibilityError, unwrapResult } from "./errors";

// Invariants
export { checkInvariants, type InvariantRule, type InvariantViolation } from "./invariants";

// Dev assertions
export {
  DEFAULT_DEV_ASSERTIONS_CONFIG,
  InvariantViolationError,
  assertSequenceInvariants,
  assertSingleCandidate,
  createDevAssertionsRunner,
  formatAssertionResult,
  shouldEnableDevAssertions,
  type DevAssertionResult,
  type DevAssertionsConfig,
  type DevAssertionsRunner,
} from "./devAssertions";

// Reassignment transform
export { applyReassignment, type ReassignInput, type ReassignOutcome } from "./reassign";

// Engine
export { FrameVisibilityEngine, createFrameVisibilityEngine } from "./engine";

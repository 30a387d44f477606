/**
 * Frame associations: constructors, visibility predicate, the signed-integer codec,
 * and validation of association requests received at the API boundary.
 */

import { isNonNegativeInteger } from "@framevis/shared";
import { z } from "zod";
import type {
  AvoidingAssociation,
  FrameAssociation,
  FrameVisibilityFailure,
  SignedFrameRequest,
  SingleFrameAssociation,
  UbiquitousAssociation,
} from "./types";

// ============================================================================
// Schemas
// ============================================================================

export const FrameIndexSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const FrameAssociationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ubiquitous") }).strict(),
  z.object({ kind: z.literal("avoiding"), frame: FrameIndexSchema }).strict(),
  z.object({ kind: z.literal("single"), frame: FrameIndexSchema }).strict(),
]);

export const SignedFrameRequestSchema = z
  .number()
  .int()
  .min(-Number.MAX_SAFE_INTEGER)
  .max(Number.MAX_SAFE_INTEGER)
  .nullable();

// ============================================================================
// Constructors
// ============================================================================

const UBIQUITOUS: UbiquitousAssociation = Object.freeze({ kind: "ubiquitous" });

export function ubiquitous(): UbiquitousAssociation {
  return UBIQUITOUS;
}

export function avoiding(frame: number): AvoidingAssociation {
  return { kind: "avoiding", frame };
}

export function singleFrame(frame: number): SingleFrameAssociation {
  return { kind: "single", frame };
}

// ============================================================================
// Queries
// ============================================================================

/** Whether a record carrying `association` is visible in `frame` */
export function isVisibleIn(association: FrameAssociation, frame: number): boolean {
  switch (association.kind) {
    case "ubiquitous":
      return true;
    case "avoiding":
      return association.frame !== frame;
    case "single":
      return association.frame === frame;
  }
}

export function associationsEqual(a: FrameAssociation, b: FrameAssociation): boolean {
  if (a.kind === "ubiquitous" || b.kind === "ubiquitous") {
    return a.kind === b.kind;
  }
  return a.kind === b.kind && a.frame === b.frame;
}

export function formatAssociation(association: FrameAssociation): string {
  switch (association.kind) {
    case "ubiquitous":
      return "all frames";
    case "avoiding":
      return `all frames except ${association.frame}`;
    case "single":
      return `frame ${association.frame}`;
  }
}

// ============================================================================
// Signed-integer codec
// ============================================================================

export function toSignedFrame(association: FrameAssociation): SignedFrameRequest {
  switch (association.kind) {
    case "ubiquitous":
      return null;
    case "avoiding":
      return -association.frame - 1;
    case "single":
      return association.frame;
  }
}

/** Decode an already validated signed request */
export function fromSignedFrame(value: SignedFrameRequest): FrameAssociation {
  if (value === null) {
    return ubiquitous();
  }
  return value < 0 ? avoiding(-value - 1) : singleFrame(value);
}

// ============================================================================
// Boundary validation
// ============================================================================

export type AssociationParseResult =
  | { ok: true; association: FrameAssociation }
  | { ok: false; error: FrameVisibilityFailure };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate an association request: a tagged association, a signed frame number or `null`.
 * Nothing is mutated before this succeeds.
 */
export function parseAssociationRequest(input: unknown): AssociationParseResult {
  if (input === null || typeof input === "number") {
    const parsed = SignedFrameRequestSchema.safeParse(input);
    if (!parsed.success) {
      return {
        ok: false,
        error: {
          code: "MALFORMED_ASSOCIATION",
          message: `Malformed signed frame request ${String(input)}: ${describeIssues(parsed.error)}`,
        },
      };
    }
    return { ok: true, association: fromSignedFrame(parsed.data) };
  }

  const parsed = FrameAssociationSchema.safeParse(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: {
        code: "MALFORMED_ASSOCIATION",
        message: `Malformed frame association: ${describeIssues(parsed.error)}`,
      },
    };
  }
  return { ok: true, association: parsed.data };
}

/** Frame indices are non-negative safe integers */
export function isValidFrame(frame: unknown): frame is number {
  return isNonNegativeInteger(frame);
}

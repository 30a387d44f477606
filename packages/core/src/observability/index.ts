/**
 * Observability
 *
 * Structured logging for frame-visibility operations.
 */

export * from "./logger";
export * from "./types";

/**
 * Observability Types
 *
 * Core types for structured logging.
 */

import type { LogLevelName } from "@framevis/shared";

// ============================================================================
// Correlation IDs
// ============================================================================

/** Correlation context attached to every entry a logger writes */
export type CorrelationContext = {
  /** Annotation primitive that owns the engine */
  primitiveId: string;
  /** Dataset the primitive is overlaid on */
  datasetId: string;
  /** Operation ID (unique per mutation) */
  opId: string;
};

// ============================================================================
// Log Levels & Events
// ============================================================================

export type LogLevel = LogLevelName;

export type LogCategory = "visibility" | "dataset" | "assertion";

/** Structured log entry */
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context: Partial<CorrelationContext>;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};

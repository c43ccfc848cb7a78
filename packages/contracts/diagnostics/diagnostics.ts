import type { SessionMs } from "../core/time";

/**
 * Diagnostic categories for grouping.
 */
export type DiagnosticCategory = "input" | "output" | "session";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A runtime diagnostic emitted when something goes wrong but the system
 * can continue operating (graceful degradation).
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  /** Category for grouping */
  category: DiagnosticCategory;

  /** Severity level */
  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Frame time the diagnostic relates to */
  timestamp: SessionMs;

  /** Optional: which component emitted this */
  source?: string;
}

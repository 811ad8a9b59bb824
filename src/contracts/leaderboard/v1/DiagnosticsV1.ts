/**
 * DiagnosticsV1 — Recoverable conditions are reported as data; fatal ones are thrown.
 *
 * Recoverable: a stage fixes the input locally (coerce, omit, degrade) and keeps going.
 * Fatal: the invocation has no usable input at all (INVALID_CONFIGURATION).
 */

export type DiagnosticCodeV1 =
  | "MALFORMED_RECORD"
  | "MISSING_PERIOD_SOURCE"
  | "MISSING_BONUS_SOURCE"
  | "SNAPSHOT_UNAVAILABLE"
  | "POLL_INVALID"
  | "MARGIN_INVALID";

export interface DiagnosticV1 {
  code: DiagnosticCodeV1;
  message: string;
  context?: Record<string, string | number>;
}

export type LeaderboardErrorCodeV1 = "INVALID_CONFIGURATION" | "SNAPSHOT_WRITE_FAILED";

export class LeaderboardErrorV1 extends Error {
  readonly code: LeaderboardErrorCodeV1;

  constructor(code: LeaderboardErrorCodeV1, detail: string) {
    super(`${code}: ${detail}`);
    this.name = "LeaderboardErrorV1";
    this.code = code;
  }
}

export function diagnostic(
  code: DiagnosticCodeV1,
  message: string,
  context?: Record<string, string | number>
): DiagnosticV1 {
  return context ? { code, message, context } : { code, message };
}

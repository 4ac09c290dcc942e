/**
 * Typed failures raised by the exporter and the circuit document loader.
 *
 * Every failure is fatal: the exporter builds the whole AST before emitting
 * anything, so a thrown error means no output was produced.
 */

import { type Diagnostic, Severity } from "./diagnostic.ts";

export type ExportErrorCode = "unsupported-construct" | "malformed-input" | "invalid-document";

export class ExportError extends Error {
  readonly code: ExportErrorCode;
  /** Message without the location suffix. */
  readonly detail: string;
  /** Path of the offending instruction, or null when the failure is not tied to one. */
  readonly location: string | null;

  constructor(code: ExportErrorCode, message: string, location: string | null = null) {
    super(location ? `${message} (at ${location})` : message);
    this.name = new.target.name;
    this.code = code;
    this.detail = message;
    this.location = location;
  }
}

/** An instruction the builder cannot lower (multi-target measure, `!=` condition, …). */
export class UnsupportedConstructError extends ExportError {
  constructor(message: string, location: string | null = null) {
    super("unsupported-construct", message, location);
  }
}

/** The circuit violates the read contract (undeclared register, non-finite angle, …). */
export class MalformedInputError extends ExportError {
  constructor(message: string, location: string | null = null) {
    super("malformed-input", message, location);
  }
}

export interface DocumentIssue {
  /** Dotted path into the document, e.g. `instructions.2.qubits.0`. */
  path: string;
  message: string;
}

/** A circuit document failed schema validation. */
export class DocumentError extends ExportError {
  readonly issues: readonly DocumentIssue[];

  constructor(issues: readonly DocumentIssue[]) {
    const n = issues.length;
    super("invalid-document", `invalid circuit document: ${n} issue${n !== 1 ? "s" : ""}`);
    this.issues = issues;
  }
}

/** Convert a failure into CLI-printable diagnostics. Unknown errors become one generic diagnostic. */
export function toDiagnostics(error: unknown, file = ""): Diagnostic[] {
  if (error instanceof DocumentError) {
    return error.issues.map((issue) => ({
      severity: Severity.Error,
      message: issue.message,
      location: { file, path: issue.path },
    }));
  }
  if (error instanceof ExportError) {
    return [
      {
        severity: Severity.Error,
        message: error.detail,
        location: { file, path: error.location ?? "" },
      },
    ];
  }
  const message = error instanceof Error ? error.message : String(error);
  return [{ severity: Severity.Error, message, location: { file, path: "" } }];
}

export { Severity } from "./diagnostic.ts";
export type { Diagnostic, InputLocation } from "./diagnostic.ts";
export {
  DocumentError,
  ExportError,
  MalformedInputError,
  UnsupportedConstructError,
  toDiagnostics,
} from "./export-error.ts";
export type { DocumentIssue, ExportErrorCode } from "./export-error.ts";

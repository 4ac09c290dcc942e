export enum Severity {
  Error = "error",
}

/** Where in the input a problem was found. */
export interface InputLocation {
  /** Source file or document name, empty when exporting an in-memory circuit. */
  file: string;
  /** Instruction path, e.g. `circuit.data[3] > bell.data[1] (measure)`, or a document path. */
  path: string;
}

export interface Diagnostic {
  severity: Severity;
  message: string;
  location: InputLocation;
}

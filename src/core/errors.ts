export type ErrorCode = "CONFIGURATION" | "IO" | "MALFORMED_LINE" | "DEGENERATE_NORM";

export class TfIdfError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A required input location is missing or a setting is invalid. Fatal. */
export class ConfigurationError extends TfIdfError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION", message, options);
  }
}

/** A document or output file could not be read, parsed or written. */
export class IOError extends TfIdfError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super("IO", `${path}: ${message}`, options);
    this.path = path;
  }
}

/** Raised only under the "strict" line tolerance. */
export class MalformedLineError extends TfIdfError {
  readonly path: string;
  readonly line: number;

  constructor(path: string, line: number, content: string) {
    super("MALFORMED_LINE", `${path}:${line}: expected "token:count", got ${JSON.stringify(content)}`);
    this.path = path;
    this.line = line;
  }
}

/** Raised only under the "throw" zero-norm policy. */
export class DegenerateNormError extends TfIdfError {
  readonly docId: string;

  constructor(docId: string) {
    super("DEGENERATE_NORM", `${docId}: every score is zero, weights cannot be normalized`);
    this.docId = docId;
  }
}

export function isTfIdfError(e: unknown): e is TfIdfError {
  return e instanceof TfIdfError;
}

/** One-line rendering for the command line. */
export function describeError(e: unknown): string {
  if (isTfIdfError(e)) return `${codeToTitle(e.code)}: ${e.message}`;
  if (e instanceof Error) return `Internal error: ${e.message}`;
  return `Internal error: ${String(e)}`;
}

function codeToTitle(code: ErrorCode): string {
  switch (code) {
    case "CONFIGURATION":
      return "Configuration error";
    case "IO":
      return "I/O error";
    case "MALFORMED_LINE":
      return "Malformed line";
    case "DEGENERATE_NORM":
      return "Degenerate norm";
  }
}

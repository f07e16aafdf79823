export type AnalyzerErrorCode = "INVALID_INPUT" | "FILE_READ" | "RENDER";

export class AnalyzerError extends Error {
  readonly code: AnalyzerErrorCode;

  constructor(code: AnalyzerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Bad request input: no files, or query parameters of the wrong shape */
export class InputValidationError extends AnalyzerError {
  readonly details: ValidationIssue[];

  constructor(message: string, details: ValidationIssue[] = []) {
    super("INVALID_INPUT", message);
    this.details = details;
  }
}

export class FileReadError extends AnalyzerError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("FILE_READ", `Cannot read log file ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export class RenderError extends AnalyzerError {
  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("RENDER", `Report rendering failed: ${reason}`, { cause });
  }
}

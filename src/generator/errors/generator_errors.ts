/**
 * Generator error types and helpers
 */

export const GENERATOR_ERROR_CODES = [
  "ParseError",
  "DuplicateClass",
  "UnresolvedBase",
  "CyclicInheritance",
  "ConfigurationError",
  "InternalError",
] as const;

export type GeneratorErrorCode = (typeof GENERATOR_ERROR_CODES)[number];

export const GENERATOR_ERROR_SEVERITIES = ["warning", "error"] as const;

export type GeneratorErrorSeverity = (typeof GENERATOR_ERROR_SEVERITIES)[number];

export interface GeneratorErrorLocation {
  filePath: string;
  line: number;
  column: number;
}

export class GeneratorError extends Error {
  readonly code: GeneratorErrorCode;
  readonly severity: GeneratorErrorSeverity;
  readonly location: GeneratorErrorLocation;
  readonly suggestion?: string;

  constructor(
    code: GeneratorErrorCode,
    severity: GeneratorErrorSeverity,
    message: string,
    location: GeneratorErrorLocation,
    suggestion?: string,
  ) {
    super(message);
    this.name = "GeneratorError";
    this.code = code;
    this.severity = severity;
    this.location = location;
    this.suggestion = suggestion;
  }
}

/**
 * Thrown by the script parser for a malformed declaration.
 */
export class ScriptParseError extends Error {
  readonly filePath: string;
  readonly line: number;
  readonly column: number;

  constructor(message: string, filePath: string, line: number, column = 1) {
    super(message);
    this.name = "ScriptParseError";
    this.filePath = filePath;
    this.line = line;
    this.column = column;
  }

  toGeneratorError(): GeneratorError {
    return new GeneratorError(
      "ParseError",
      "warning",
      this.message,
      { filePath: this.filePath, line: this.line, column: this.column },
      "The file was skipped; fix the declaration to generate its bridge.",
    );
  }
}

export class AggregateGeneratorError extends Error {
  readonly errors: GeneratorError[];

  constructor(errors: GeneratorError[]) {
    super(AggregateGeneratorError.formatMessage(errors));
    this.name = "AggregateGeneratorError";
    this.errors = errors;
  }

  static formatLine(err: GeneratorError): string {
    const loc = `${err.location.filePath}:${err.location.line}:${err.location.column}`;
    const suggestion = err.suggestion ? ` (hint: ${err.suggestion})` : "";
    return `- [${err.code}] ${loc} ${err.message}${suggestion}`;
  }

  private static formatMessage(errors: GeneratorError[]): string {
    const header = `Bridge generation failed with ${errors.length} error(s):`;
    const lines = errors.map((err) => AggregateGeneratorError.formatLine(err));
    return [header, ...lines].join("\n");
  }
}

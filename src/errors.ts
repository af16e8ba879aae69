/**
 * Error handling for epitope table extraction
 *
 * Every failure the library raises derives from EpimapError so callers can
 * branch on `code` or on the class.
 */

/**
 * Base error class for all epimap errors
 */
export class EpimapError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "EpimapError";
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or data
 */
export class ValidationError extends EpimapError {
  constructor(message: string, lineNumber?: number, context?: string, code = "VALIDATION_ERROR") {
    super(message, code, lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * A column the operation needs is not present in the table or file header
 */
export class SchemaError extends ValidationError {
  constructor(
    message: string,
    public readonly missingColumns: readonly string[],
    public readonly availableColumns: readonly string[] = []
  ) {
    super(
      message,
      undefined,
      availableColumns.length > 0 ? `available columns: ${availableColumns.join(", ")}` : undefined,
      "SCHEMA_ERROR"
    );
    this.name = "SchemaError";
  }

  static forColumns(
    missing: readonly string[],
    available: readonly string[],
    source: string
  ): SchemaError {
    const list = missing.map((c) => `"${c}"`).join(", ");
    const noun = missing.length === 1 ? "column" : "columns";
    return new SchemaError(`Missing ${noun} ${list} in ${source}`, missing, available);
  }
}

/**
 * Unknown filter operator or operand of the wrong shape
 */
export class InvalidConditionError extends ValidationError {
  constructor(
    message: string,
    public readonly column?: string,
    public readonly operator?: string
  ) {
    super(
      column !== undefined ? `${message} (column "${column}")` : message,
      undefined,
      undefined,
      "INVALID_CONDITION"
    );
    this.name = "InvalidConditionError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends EpimapError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * DSV-specific parsing error with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined ? `line ${line}` : "",
      column !== undefined ? `column ${column}` : "",
      field !== undefined ? `field "${field}"` : "",
    ]
      .filter((part) => part !== "")
      .join(", ");

    super(context ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends EpimapError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "decompress",
    public readonly systemError?: unknown,
    context?: string,
    code = "FILE_ERROR"
  ) {
    super(message, code, undefined, context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("incorrect header check") || msg.includes("unexpected end")) {
      return "Gzip data appears to be truncated or corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Input path does not exist
 */
export class NotFoundError extends FileError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, filePath, "stat", undefined, undefined, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

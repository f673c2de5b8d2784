export class PipelineError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONFIG_ERROR", cause });
  }
}

export class NetworkError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "NETWORK_ERROR", cause });
  }
}

export class CsvParseError extends PipelineError {
  constructor(
    public readonly line: number,
    public readonly column: number,
    public readonly reason: string
  ) {
    super(`parse error on line ${line}, column ${column}: ${reason}`, {
      code: "CSV_PARSE_ERROR",
    });
  }
}

export class ValidationFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "VALIDATION_ERROR", cause });
  }
}

export class ConversionError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "CONVERSION_ERROR", cause });
  }
}

export class OutputWriteError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "OUTPUT_WRITE_ERROR", cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  return error instanceof PipelineError ? error.code : "UNEXPECTED_ERROR";
}

import type { ZodIssue } from "zod";

import type { AnnotationFormat } from "./dataset";

/** Thrown for invalid options, before any file is processed. */
export class ConfigError extends Error {
  public readonly name = "ConfigError";

  constructor(message: string) {
    super(message);
  }
}

/**
 * Thrown when an annotation document is not valid JSON or does not match
 * the expected schema. One bad file aborts the whole conversion.
 */
export class AnnotationParseError extends Error {
  public readonly name = "AnnotationParseError";

  constructor(
    public readonly detail: string,
    public readonly format: AnnotationFormat,
    public readonly issues: ZodIssue[] = [],
    public readonly filePath?: string
  ) {
    super(filePath ? `${detail} (file: ${filePath})` : detail);
  }

  /** Same error, attributed to the file it was read from. */
  withFilePath(filePath: string): AnnotationParseError {
    return new AnnotationParseError(
      this.detail,
      this.format,
      this.issues,
      filePath
    );
  }
}

/** Wraps a failed read, write, copy or mkdir with the path involved. */
export class DatasetIoError extends Error {
  public readonly name = "DatasetIoError";

  constructor(
    public readonly operation: "read" | "write" | "copy" | "mkdir" | "scan",
    public readonly path: string,
    public readonly cause: unknown
  ) {
    super(
      `Failed to ${operation} ${path}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`
    );
  }
}

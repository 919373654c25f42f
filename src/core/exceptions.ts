/**
 * Custom exceptions for lineage extraction.
 */

export class ExtractorNotImplementedError extends Error {
  extractorName: string;

  constructor(extractorName: string) {
    super(`${extractorName} does not declare its supported task types`);
    this.name = "ExtractorNotImplementedError";
    this.extractorName = extractorName;
  }
}

export class MismatchedExtractorError extends Error {
  taskType: string;
  supported: string[];

  constructor(extractorName: string, taskType: string, supported: Iterable<string>) {
    const names = [...supported].sort();
    super(
      `Mismatched extractor: ${extractorName} supports [${names.join(", ")}], got ${taskType}`,
    );
    this.name = "MismatchedExtractorError";
    this.taskType = taskType;
    this.supported = names;
  }
}

export class ExtractorStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractorStateError";
  }
}

export class DuplicateTaskTypeError extends Error {
  taskType: string;

  constructor(taskType: string, existing: string, incoming: string) {
    super(
      `Task type ${taskType} is already handled by ${existing}, refusing ${incoming}`,
    );
    this.name = "DuplicateTaskTypeError";
    this.taskType = taskType;
  }
}

export class UnknownExtractorError extends Error {
  constructor(extractorName: string) {
    super(`Unknown extractor: ${extractorName}`);
    this.name = "UnknownExtractorError";
  }
}

export class ExtractionTimeoutError extends Error {
  timeoutMs: number;

  constructor(extractorName: string, timeoutMs: number) {
    super(`${extractorName} did not finish extraction within ${timeoutMs}ms`);
    this.name = "ExtractionTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

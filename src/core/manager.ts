/**
 * Extractor manager – dispatches one task execution to its extractor.
 *
 * Every call builds a fresh extractor, so a failure while extracting one
 * task never leaks into another.
 */
import type winston from "winston";

import { getLogger } from "../logger.js";
import {
  ExtractionTimeoutError,
  ExtractorNotImplementedError,
  MismatchedExtractorError,
} from "./exceptions.js";
import { runExtractOnComplete, type BaseExtractor } from "./extractor.js";
import type { ExtractorRegistry } from "./registry.js";
import type { ExtractionResult, Operator, TaskMetadata, TaskRun } from "./types.js";

export interface ExtractorManagerOptions {
  disabledTaskTypes?: Iterable<string>;
  extractionTimeoutMs?: number;
}

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 10_000;

function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class ExtractorManager {
  private registry: ExtractorRegistry;
  private disabled: ReadonlySet<string>;
  private timeoutMs: number;
  private log: winston.Logger;

  constructor(registry: ExtractorRegistry, opts: ExtractorManagerOptions = {}) {
    this.registry = registry;
    this.disabled = new Set(opts.disabledTaskTypes ?? []);
    this.timeoutMs = opts.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
    this.log = getLogger().child({ component: "extractor-manager" });
  }

  /** Task types that would be dispatched to an extractor. */
  taskTypes(): string[] {
    return this.registry.taskTypes().filter((t) => !this.disabled.has(t));
  }

  /** Extract from the operator's configuration, before or without a run. */
  async extractMetadata(operator: Operator): Promise<ExtractionResult> {
    return this.dispatch(operator, (extractor) => extractor.extract());
  }

  /** Extract once the task has finished, with access to its run state. */
  async extractMetadataOnComplete(
    operator: Operator,
    run: TaskRun,
  ): Promise<ExtractionResult> {
    return this.dispatch(operator, (extractor) =>
      runExtractOnComplete(extractor, run),
    );
  }

  private async dispatch(
    operator: Operator,
    extract: (extractor: BaseExtractor) => Promise<TaskMetadata | null>,
  ): Promise<ExtractionResult> {
    const { taskId, taskType } = operator;

    if (this.disabled.has(taskType)) {
      this.log.debug("Extraction disabled for task type", { taskId, taskType });
      return { status: "disabled" };
    }

    const factory = this.registry.factoryFor(taskType);
    if (!factory) {
      this.log.debug("No extractor registered", { taskId, taskType });
      return { status: "no_extractor" };
    }

    const extractorName = factory.extractorName;
    try {
      const extractor = factory.create();
      extractor.bind(operator);
      extractor.validate();

      const metadata = await withTimeout(
        extract(extractor),
        this.timeoutMs,
        () => new ExtractionTimeoutError(extractorName, this.timeoutMs),
      );

      if (metadata === null) {
        this.log.debug("No metadata extracted", { taskId, taskType, extractor: extractorName });
        return { status: "no_metadata", extractor: extractorName };
      }
      return { status: "extracted", extractor: extractorName, metadata };
    } catch (err) {
      if (err instanceof ExtractorNotImplementedError) throw err;
      if (err instanceof MismatchedExtractorError) {
        this.log.warn(err.message, { taskId, taskType });
        return { status: "mismatched", extractor: extractorName, error: err };
      }
      const error = toError(err);
      this.log.error("Extraction failed", {
        taskId,
        taskType,
        extractor: extractorName,
        error: error.message,
      });
      return { status: "failed", extractor: extractorName, error };
    }
  }
}

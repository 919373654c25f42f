/**
 * Extractor contract – one implementation per family of task types.
 */
import type winston from "winston";

import { getLogger } from "../logger.js";
import {
  ExtractorNotImplementedError,
  ExtractorStateError,
  MismatchedExtractorError,
} from "./exceptions.js";
import type { Operator, TaskMetadata, TaskRun } from "./types.js";

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/**
 * Lifecycle: constructed → bind (once) → validate (optional, repeatable)
 * → extract / extractOnComplete (0..2 times) → discarded.
 *
 * A `null` result means the task produced nothing extractable.
 */
export interface Extractor {
  bind(operator: Operator): void;
  validate(): void;
  extract(): Promise<TaskMetadata | null>;
  extractOnComplete?(run: TaskRun): Promise<TaskMetadata | null>;
}

export type ExtractorState = "constructed" | "bound";

/** Static side of an extractor: what the registry stores. */
export interface ExtractorClass {
  new (): BaseExtractor;
  readonly extractorName: string;
  supportedTaskTypes(): ReadonlySet<string>;
}

/**
 * Post-completion extraction. Falls back to `extract()` for extractors
 * that have nothing more to report once the task has run.
 */
export async function runExtractOnComplete(
  extractor: Extractor,
  run: TaskRun,
): Promise<TaskMetadata | null> {
  if (extractor.extractOnComplete) {
    return extractor.extractOnComplete(run);
  }
  return extractor.extract();
}

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

export abstract class BaseExtractor implements Extractor {
  /**
   * Task type names this extractor handles, including deprecated aliases
   * that subclass a canonical operator. Subclasses must override.
   */
  static supportedTaskTypes(): ReadonlySet<string> {
    throw new ExtractorNotImplementedError(this.extractorName);
  }

  static get extractorName(): string {
    return this.name;
  }

  private readonly kind: typeof BaseExtractor;
  private bound: Operator | null = null;
  private _log: winston.Logger | null = null;

  constructor() {
    this.kind = new.target;
  }

  get state(): ExtractorState {
    return this.bound ? "bound" : "constructed";
  }

  get extractorName(): string {
    return this.kind.extractorName;
  }

  protected get operator(): Operator {
    if (!this.bound) {
      throw new ExtractorStateError(`${this.extractorName} is not bound to an operator`);
    }
    return this.bound;
  }

  protected get log(): winston.Logger {
    this._log ??= getLogger().child({ extractor: this.extractorName });
    return this._log;
  }

  bind(operator: Operator): void {
    if (this.bound) {
      throw new ExtractorStateError(
        `${this.extractorName} is already bound to ${this.bound.taskId}`,
      );
    }
    this.bound = operator;
    this.patch(operator);
  }

  /** One-time side effects on the operator, e.g. tagging its jobs. */
  protected patch(_operator: Operator): void {}

  validate(): void {
    const { taskType } = this.operator;
    const supported = this.kind.supportedTaskTypes();
    if (!supported.has(taskType)) {
      throw new MismatchedExtractorError(this.extractorName, taskType, supported);
    }
  }

  abstract extract(): Promise<TaskMetadata | null>;
}

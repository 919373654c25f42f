/**
 * Extractor registry – maps task type names to extractor factories.
 *
 * Built once at process start; dispatch is a plain map lookup.
 */
import { getLogger } from "../logger.js";
import type { BaseExtractor, ExtractorClass } from "./extractor.js";
import { DuplicateTaskTypeError, UnknownExtractorError } from "./exceptions.js";

export interface ExtractorFactory {
  readonly extractorName: string;
  /** The class passed to `register`, also for alias factories. */
  readonly source: ExtractorClass;
  create(): BaseExtractor;
}

export interface RegisterOptions {
  /** Replace whatever extractor currently handles the same task types. */
  override?: boolean;
}

function toFactory(cls: ExtractorClass, source: ExtractorClass = cls): ExtractorFactory {
  return { extractorName: cls.extractorName, source, create: () => new cls() };
}

/**
 * Subclass `base` so that it also declares `taskType`; `validate()` keeps
 * checking against the declared set.
 */
function withExtraTaskType(base: ExtractorClass, taskType: string): ExtractorClass {
  const declared = new Set([...base.supportedTaskTypes(), taskType]);
  return class extends base {
    static supportedTaskTypes(): ReadonlySet<string> {
      return declared;
    }

    static get extractorName(): string {
      return base.extractorName;
    }
  };
}

export class ExtractorRegistry {
  private byTaskType = new Map<string, ExtractorFactory>();
  private byName = new Map<string, ExtractorClass>();

  register(cls: ExtractorClass, opts: RegisterOptions = {}): this {
    // Fails here, not at dispatch, when the class declares nothing.
    const taskTypes = cls.supportedTaskTypes();
    const factory = toFactory(cls);

    if (!opts.override) {
      for (const taskType of taskTypes) {
        const existing = this.byTaskType.get(taskType);
        if (existing && existing.source !== cls) {
          throw new DuplicateTaskTypeError(
            taskType,
            existing.extractorName,
            factory.extractorName,
          );
        }
      }
    }

    for (const taskType of taskTypes) {
      this.byTaskType.set(taskType, factory);
    }
    this.byName.set(cls.extractorName, cls);
    return this;
  }

  /**
   * Route an extra task type name to an already registered extractor.
   * An alias always takes precedence over an existing mapping.
   */
  alias(taskType: string, extractorName: string): this {
    const cls = this.byName.get(extractorName);
    if (!cls) throw new UnknownExtractorError(extractorName);

    const existing = this.byTaskType.get(taskType);
    if (existing && existing.source !== cls) {
      getLogger().warn("Alias replaces the extractor for a task type", {
        taskType,
        previous: existing.extractorName,
        extractor: extractorName,
      });
    }
    this.byTaskType.set(taskType, toFactory(withExtraTaskType(cls, taskType), cls));
    return this;
  }

  factoryFor(taskType: string): ExtractorFactory | undefined {
    return this.byTaskType.get(taskType);
  }

  has(taskType: string): boolean {
    return this.byTaskType.has(taskType);
  }

  taskTypes(): string[] {
    return [...this.byTaskType.keys()].sort();
  }

  extractorNames(): string[] {
    return [...this.byName.keys()].sort();
  }
}

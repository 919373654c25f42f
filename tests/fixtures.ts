/**
 * Shared test fixtures: operators, runs, test extractors, temp files.
 */
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { BaseExtractor } from "../src/core/extractor.js";
import { createTaskMetadata, makeDataset } from "../src/core/metadata.js";
import type { Operator, TaskMetadata, TaskRun } from "../src/core/types.js";

// ---------------------------------------------------------------------------
// Operators & runs
// ---------------------------------------------------------------------------

export function makeOperator(
  taskType: string,
  config: Record<string, unknown> = {},
  taskId = "task_1",
): Operator {
  return { taskId, taskType, config };
}

export function bigQueryOperator(taskType = "BigQueryOperator"): Operator {
  return makeOperator(
    taskType,
    { sourceTable: "project.ds.in", destinationTable: "project.ds.out" },
    "load_daily",
  );
}

export function makeRun(result: Record<string, unknown> = {}): TaskRun {
  return { runId: "run-001", state: "success", result };
}

// ---------------------------------------------------------------------------
// Test extractors
// ---------------------------------------------------------------------------

/** Declares nothing: supportedTaskTypes() is left to the base class. */
export class UndeclaredExtractor extends BaseExtractor {
  async extract(): Promise<TaskMetadata | null> {
    return null;
  }
}

/** Reads `table` from config; no `extractOnComplete` override. */
export class TableExtractor extends BaseExtractor {
  static supportedTaskTypes(): ReadonlySet<string> {
    return new Set(["TableOperator", "LegacyTableOperator"]);
  }

  async extract(): Promise<TaskMetadata | null> {
    const table = this.operator.config.table;
    if (typeof table !== "string") return null;
    return createTaskMetadata({
      name: this.operator.taskId,
      inputs: [makeDataset("warehouse", table)],
    });
  }
}

export class ThrowingExtractor extends BaseExtractor {
  static supportedTaskTypes(): ReadonlySet<string> {
    return new Set(["ThrowingOperator"]);
  }

  async extract(): Promise<TaskMetadata | null> {
    throw new Error("boom");
  }
}

export class SlowExtractor extends BaseExtractor {
  static supportedTaskTypes(): ReadonlySet<string> {
    return new Set(["SlowOperator"]);
  }

  async extract(): Promise<TaskMetadata | null> {
    return new Promise<TaskMetadata | null>((resolve) => {
      setTimeout(() => resolve(null), 200);
    });
  }
}

// ---------------------------------------------------------------------------
// Temp dir + manifest helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "task-lineage-test-"));
}

export function writeManifest(dir: string, contents: unknown): string {
  const p = join(dir, "tasks.json");
  writeFileSync(p, typeof contents === "string" ? contents : JSON.stringify(contents));
  return p;
}

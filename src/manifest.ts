/**
 * Task manifest reader – a JSON array of operators (and optional runs).
 *
 *   [
 *     {
 *       "operator": { "taskId": "load", "taskType": "BigQueryOperator", "config": {...} },
 *       "run": { "runId": "r1", "state": "success", "result": { "jobId": "job_1" } }
 *     }
 *   ]
 */
import { createReadStream } from "node:fs";
import StreamArray from "stream-json/streamers/StreamArray.js";
import { z } from "zod";

import { ManifestError } from "./core/exceptions.js";
import type { Operator, TaskRun } from "./core/types.js";

export const OperatorSchema = z.object({
  taskId: z.string().min(1),
  taskType: z.string().min(1),
  config: z.record(z.unknown()).default({}),
});

export const TaskRunSchema = z.object({
  runId: z.string().min(1),
  state: z.enum(["success", "failed", "skipped"]),
  result: z.record(z.unknown()).default({}),
});

export const ManifestEntrySchema = z.object({
  operator: OperatorSchema,
  run: TaskRunSchema.optional(),
});

export interface ManifestEntry {
  operator: Operator;
  run?: TaskRun;
}

export function parseManifestEntry(value: unknown, index: number): ManifestEntry {
  const parsed = ManifestEntrySchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ManifestError(`Invalid manifest entry #${index}: ${issues}`);
  }
  return parsed.data;
}

/** Parse a manifest file incrementally, validating entry by entry. */
export async function readTaskManifest(path: string): Promise<ManifestEntry[]> {
  return new Promise<ManifestEntry[]>((resolve, reject) => {
    const entries: ManifestEntry[] = [];
    let rejected = false;
    const onError = (err: Error) => {
      if (!rejected) {
        rejected = true;
        reject(err instanceof ManifestError ? err : new ManifestError(`${path}: ${err.message}`));
      }
    };

    const file = createReadStream(path);
    const pipeline = StreamArray.withParser();

    file.on("error", onError);
    pipeline.on("error", onError);

    pipeline.on("data", ({ key, value }: { key: number; value: unknown }) => {
      if (rejected) return;
      try {
        entries.push(parseManifestEntry(value, key));
      } catch (err) {
        onError(err instanceof Error ? err : new Error(String(err)));
        file.destroy();
      }
    });

    pipeline.on("end", () => {
      if (!rejected) resolve(entries);
    });

    file.pipe(pipeline);
  });
}

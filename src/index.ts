/**
 * task-lineage – lineage metadata extraction for pipeline tasks.
 */
import { buildManager, parseConfig } from "./config.js";
import type { ExtractorManager } from "./core/manager.js";
import type { ExtractionResult } from "./core/types.js";
import type { ManifestEntry } from "./manifest.js";

export { BaseExtractor, runExtractOnComplete } from "./core/extractor.js";
export type { Extractor, ExtractorClass, ExtractorState } from "./core/extractor.js";
export { ExtractorRegistry } from "./core/registry.js";
export type { ExtractorFactory, RegisterOptions } from "./core/registry.js";
export { ExtractorManager } from "./core/manager.js";
export type { ExtractorManagerOptions } from "./core/manager.js";
export {
  createTaskMetadata,
  isSameTaskMetadata,
  makeDataset,
  makeFacet,
} from "./core/metadata.js";
export type * from "./core/types.js";
export * from "./core/exceptions.js";
export { ConfigSchema, loadConfigFromEnv, parseConfig, buildManager } from "./config.js";
export type { Config } from "./config.js";
export { DEFAULT_EXTRACTORS, createDefaultRegistry } from "./extractors/registry.js";
export { BigQueryExtractor } from "./extractors/bigquery/extractor.js";
export { S3CopyObjectExtractor } from "./extractors/s3/copy.js";
export { readTaskManifest } from "./manifest.js";
export type { ManifestEntry } from "./manifest.js";

export interface ManifestResult {
  taskId: string;
  result: ExtractionResult;
}

/** Construct a manager from a configuration object (validated with Zod). */
export function fromConfig(config: unknown = {}): ExtractorManager {
  return buildManager(parseConfig(config));
}

/**
 * Run every manifest entry through the manager, one task at a time.
 * With `onComplete`, entries carrying a run use post-completion extraction.
 */
export async function extractManifest(
  manager: ExtractorManager,
  entries: ManifestEntry[],
  opts: { onComplete?: boolean } = {},
): Promise<ManifestResult[]> {
  const results: ManifestResult[] = [];
  for (const { operator, run } of entries) {
    const result =
      opts.onComplete && run
        ? await manager.extractMetadataOnComplete(operator, run)
        : await manager.extractMetadata(operator);
    results.push({ taskId: operator.taskId, result });
  }
  return results;
}

/** One output line per task. */
export function formatResult(taskId: string, result: ExtractionResult): string {
  switch (result.status) {
    case "extracted":
      return JSON.stringify({
        taskId,
        status: result.status,
        extractor: result.extractor,
        metadata: result.metadata,
      });
    case "mismatched":
    case "failed":
      return JSON.stringify({
        taskId,
        status: result.status,
        extractor: result.extractor,
        error: result.error.message,
      });
    case "no_metadata":
      return JSON.stringify({ taskId, status: result.status, extractor: result.extractor });
    case "no_extractor":
    case "disabled":
      return JSON.stringify({ taskId, status: result.status });
  }
}

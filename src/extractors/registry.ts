/**
 * Default extractor registry – the extractors shipped with this package.
 */
import type { ExtractorClass } from "../core/extractor.js";
import { ExtractorRegistry } from "../core/registry.js";
import { BigQueryExtractor } from "./bigquery/extractor.js";
import { S3CopyObjectExtractor } from "./s3/copy.js";

export const DEFAULT_EXTRACTORS: readonly ExtractorClass[] = [
  BigQueryExtractor,
  S3CopyObjectExtractor,
];

/** Registry of the default extractors plus `taskType → extractorName` aliases. */
export function createDefaultRegistry(
  aliases: Record<string, string> = {},
): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  for (const cls of DEFAULT_EXTRACTORS) registry.register(cls);
  for (const [taskType, extractorName] of Object.entries(aliases)) {
    registry.alias(taskType, extractorName);
  }
  return registry;
}

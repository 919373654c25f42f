/**
 * S3 object copy extractor.
 */
import { BaseExtractor } from "../../core/extractor.js";
import { createTaskMetadata, makeDataset } from "../../core/metadata.js";
import type { TaskMetadata } from "../../core/types.js";
import { S3CopyConfigSchema } from "./schemas.js";

export class S3CopyObjectExtractor extends BaseExtractor {
  static supportedTaskTypes(): ReadonlySet<string> {
    return new Set(["S3CopyObjectOperator"]);
  }

  async extract(): Promise<TaskMetadata | null> {
    const parsed = S3CopyConfigSchema.safeParse(this.operator.config);
    if (!parsed.success) {
      this.log.warn("Unreadable S3 copy operator config", {
        taskId: this.operator.taskId,
      });
      return null;
    }
    const cfg = parsed.data;

    return createTaskMetadata({
      name: this.operator.taskId,
      inputs: [makeDataset(`s3://${cfg.sourceBucketName}`, cfg.sourceBucketKey)],
      outputs: [makeDataset(`s3://${cfg.destBucketName}`, cfg.destBucketKey)],
    });
  }
}

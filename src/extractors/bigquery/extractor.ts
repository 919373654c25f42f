/**
 * BigQuery query job extractor.
 */
import { BaseExtractor } from "../../core/extractor.js";
import { createTaskMetadata, makeDataset, makeFacet } from "../../core/metadata.js";
import type { Dataset, Operator, TaskMetadata, TaskRun } from "../../core/types.js";
import {
  BigQueryConfigSchema,
  BigQueryJobIdSchema,
  BytesProcessedSchema,
  CachedSchema,
  LabelsSchema,
  type BigQueryConfig,
} from "./schemas.js";

export const BIGQUERY_NAMESPACE = "bigquery";
export const TASK_ID_LABEL = "lineage-task-id";

const SQL_FACET_SCHEMA = "https://openlineage.io/spec/facets/1-0-0/SQLJobFacet.json";
const JOB_FACET_SCHEMA = "https://openlineage.io/spec/facets/1-0-0/BigQueryJobRunFacet.json";

/** Label values: lowercase letters, digits, `_` and `-`, at most 63 chars. */
export function toLabelValue(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_-]/g, "_").slice(0, 63);
}

export class BigQueryExtractor extends BaseExtractor {
  static supportedTaskTypes(): ReadonlySet<string> {
    // BigQueryExecuteQueryOperator is the deprecated name of the same operator.
    return new Set(["BigQueryOperator", "BigQueryExecuteQueryOperator"]);
  }

  protected patch(operator: Operator): void {
    // Keep the string-valued labels the operator already carries.
    const existing: Record<string, string> = {};
    const labels = LabelsSchema.safeParse(operator.config.labels);
    if (labels.success) {
      for (const [key, value] of Object.entries(labels.data)) {
        if (typeof value === "string") existing[key] = value;
      }
    }
    operator.config.labels = {
      ...existing,
      [TASK_ID_LABEL]: toLabelValue(operator.taskId),
    };
  }

  async extract(): Promise<TaskMetadata | null> {
    const config = this.parseConfig();
    if (!config) return null;

    const inputs: Dataset[] = config.sourceTable
      ? [makeDataset(BIGQUERY_NAMESPACE, config.sourceTable)]
      : [];
    const outputs: Dataset[] = config.destinationTable
      ? [makeDataset(BIGQUERY_NAMESPACE, config.destinationTable)]
      : [];
    if (inputs.length === 0 && outputs.length === 0) return null;

    return createTaskMetadata({
      name: this.operator.taskId,
      inputs,
      outputs,
      jobFacets: config.sql
        ? { sql: makeFacet(SQL_FACET_SCHEMA, { query: config.sql }) }
        : {},
    });
  }

  async extractOnComplete(run: TaskRun): Promise<TaskMetadata | null> {
    const metadata = await this.extract();
    if (!metadata) return null;

    const jobId = BigQueryJobIdSchema.safeParse(run.result.jobId);
    if (!jobId.success) return metadata;

    const fields: Record<string, unknown> = { jobId: jobId.data };
    const bytes = BytesProcessedSchema.safeParse(run.result.totalBytesProcessed);
    if (bytes.success) fields.totalBytesProcessed = bytes.data;
    const cached = CachedSchema.safeParse(run.result.cached);
    if (cached.success) fields.cached = cached.data;

    return createTaskMetadata({
      ...metadata,
      runFacets: {
        ...metadata.runFacets,
        bigQueryJob: makeFacet(JOB_FACET_SCHEMA, fields),
      },
    });
  }

  private parseConfig(): BigQueryConfig | null {
    const parsed = BigQueryConfigSchema.safeParse(this.operator.config);
    if (!parsed.success) {
      this.log.warn("Unreadable BigQuery operator config", {
        taskId: this.operator.taskId,
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }
}

/**
 * Lineage metadata types.
 */

/** Opaque structured payload attached to a run, job or dataset. */
export interface Facet {
  _producer: string;
  _schemaURL: string;
  [field: string]: unknown;
}

export type Facets = Record<string, Facet>;

/** A data source or sink, identified by namespace + name. */
export interface Dataset {
  namespace: string;
  name: string;
  facets: Facets;
}

/** What one task execution read, wrote and reported. */
export interface TaskMetadata {
  /** @deprecated Derive identity from the operator instead. */
  readonly name: string;
  readonly inputs: readonly Dataset[];
  readonly outputs: readonly Dataset[];
  readonly runFacets: Readonly<Facets>;
  readonly jobFacets: Readonly<Facets>;
}

/** A task instance as handed over by the orchestrator. */
export interface Operator {
  taskId: string;
  /** Runtime type name used for dispatch, e.g. "BigQueryOperator". */
  taskType: string;
  /** Operator-specific settings; extractors may annotate it in `patch`. */
  config: Record<string, unknown>;
}

export type TaskRunState = "success" | "failed" | "skipped";

/** Post-execution state of a task. */
export interface TaskRun {
  runId: string;
  state: TaskRunState;
  result: Record<string, unknown>;
}

/** Outcome of one dispatch through the extractor manager. */
export type ExtractionResult =
  | { status: "extracted"; extractor: string; metadata: TaskMetadata }
  | { status: "no_metadata"; extractor: string }
  | { status: "no_extractor" }
  | { status: "disabled" }
  | { status: "mismatched"; extractor: string; error: Error }
  | { status: "failed"; extractor: string; error: Error };

export type ExtractionStatus = ExtractionResult["status"];

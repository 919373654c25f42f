/**
 * TaskMetadata construction and comparison helpers.
 */
import { isDeepStrictEqual } from "node:util";

import type { Dataset, Facet, Facets, TaskMetadata } from "./types.js";

export const PRODUCER = "task-lineage";

export interface TaskMetadataInit {
  name: string;
  inputs?: readonly Dataset[];
  outputs?: readonly Dataset[];
  runFacets?: Readonly<Facets>;
  jobFacets?: Readonly<Facets>;
}

function freezeDatasets(datasets: readonly Dataset[]): readonly Dataset[] {
  return Object.freeze(
    datasets.map((d) =>
      Object.freeze({ ...d, facets: Object.freeze({ ...d.facets }) }),
    ),
  );
}

/**
 * Build an immutable metadata record. Omitted collections default to
 * empty ones; the caller's arrays and maps are copied.
 */
export function createTaskMetadata(init: TaskMetadataInit): TaskMetadata {
  return Object.freeze({
    name: init.name,
    inputs: freezeDatasets(init.inputs ?? []),
    outputs: freezeDatasets(init.outputs ?? []),
    runFacets: Object.freeze({ ...(init.runFacets ?? {}) }),
    jobFacets: Object.freeze({ ...(init.jobFacets ?? {}) }),
  });
}

export function isSameTaskMetadata(a: TaskMetadata, b: TaskMetadata): boolean {
  return isDeepStrictEqual(a, b);
}

export function makeDataset(
  namespace: string,
  name: string,
  facets: Facets = {},
): Dataset {
  return { namespace, name, facets };
}

export function makeFacet(
  schemaURL: string,
  fields: Record<string, unknown>,
): Facet {
  return { ...fields, _producer: PRODUCER, _schemaURL: schemaURL };
}

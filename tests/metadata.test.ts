/**
 * Unit tests for TaskMetadata construction.
 */
import { describe, test, expect } from "vitest";
import {
  PRODUCER,
  createTaskMetadata,
  isSameTaskMetadata,
  makeDataset,
  makeFacet,
} from "../src/core/metadata.js";
import type { Dataset } from "../src/core/types.js";

describe("createTaskMetadata", () => {
  test("omitted collections default to empty", () => {
    const meta = createTaskMetadata({ name: "dag.task" });
    expect(meta.name).toBe("dag.task");
    expect(meta.inputs).toEqual([]);
    expect(meta.outputs).toEqual([]);
    expect(meta.runFacets).toEqual({});
    expect(meta.jobFacets).toEqual({});
  });

  test("collections default independently", () => {
    const meta = createTaskMetadata({
      name: "t",
      outputs: [makeDataset("bigquery", "p.d.out")],
      jobFacets: { sql: makeFacet("https://example.com/sql.json", { query: "SELECT 1" }) },
    });
    expect(meta.inputs).toEqual([]);
    expect(meta.outputs).toEqual([{ namespace: "bigquery", name: "p.d.out", facets: {} }]);
    expect(meta.runFacets).toEqual({});
    expect(meta.jobFacets.sql).toEqual({
      query: "SELECT 1",
      _producer: PRODUCER,
      _schemaURL: "https://example.com/sql.json",
    });
  });

  test("record is frozen", () => {
    const meta = createTaskMetadata({ name: "t", inputs: [makeDataset("ns", "a")] });
    expect(Object.isFrozen(meta)).toBe(true);
    expect(Object.isFrozen(meta.inputs)).toBe(true);
    expect(Object.isFrozen(meta.inputs[0])).toBe(true);
    expect(Object.isFrozen(meta.runFacets)).toBe(true);
  });

  test("caller mutation does not leak in", () => {
    const inputs: Dataset[] = [makeDataset("ns", "a")];
    const meta = createTaskMetadata({ name: "t", inputs });
    inputs.push(makeDataset("ns", "b"));
    expect(meta.inputs).toHaveLength(1);
  });

  test("keeps dataset order", () => {
    const meta = createTaskMetadata({
      name: "t",
      inputs: [makeDataset("ns", "z"), makeDataset("ns", "a"), makeDataset("ns", "m")],
    });
    expect(meta.inputs.map((d) => d.name)).toEqual(["z", "a", "m"]);
  });
});

describe("isSameTaskMetadata", () => {
  test("structural equality", () => {
    const a = createTaskMetadata({ name: "t", inputs: [makeDataset("ns", "a")] });
    const b = createTaskMetadata({ name: "t", inputs: [makeDataset("ns", "a")] });
    expect(a).not.toBe(b);
    expect(isSameTaskMetadata(a, b)).toBe(true);
  });

  test("differs on facets", () => {
    const a = createTaskMetadata({ name: "t" });
    const b = createTaskMetadata({
      name: "t",
      runFacets: { x: makeFacet("https://example.com/x.json", {}) },
    });
    expect(isSameTaskMetadata(a, b)).toBe(false);
  });

  test("differs on dataset order", () => {
    const a = createTaskMetadata({ name: "t", inputs: [makeDataset("ns", "a"), makeDataset("ns", "b")] });
    const b = createTaskMetadata({ name: "t", inputs: [makeDataset("ns", "b"), makeDataset("ns", "a")] });
    expect(isSameTaskMetadata(a, b)).toBe(false);
  });
});

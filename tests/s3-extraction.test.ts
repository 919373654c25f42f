/**
 * Unit tests for the S3 copy extractor.
 */
import { describe, test, expect } from "vitest";
import { runExtractOnComplete } from "../src/core/extractor.js";
import { S3CopyObjectExtractor } from "../src/extractors/s3/copy.js";
import { makeOperator, makeRun } from "./fixtures.js";

const COPY_CONFIG = {
  sourceBucketName: "raw",
  sourceBucketKey: "events/2024/01/01.json",
  destBucketName: "curated",
  destBucketKey: "events/latest.json",
};

describe("S3CopyObjectExtractor", () => {
  test("source and destination objects", async () => {
    const ex = new S3CopyObjectExtractor();
    ex.bind(makeOperator("S3CopyObjectOperator", COPY_CONFIG, "copy_events"));
    ex.validate();
    const meta = await ex.extract();
    expect(meta).toEqual({
      name: "copy_events",
      inputs: [{ namespace: "s3://raw", name: "events/2024/01/01.json", facets: {} }],
      outputs: [{ namespace: "s3://curated", name: "events/latest.json", facets: {} }],
      runFacets: {},
      jobFacets: {},
    });
  });

  test("missing keys give no metadata", async () => {
    const ex = new S3CopyObjectExtractor();
    ex.bind(makeOperator("S3CopyObjectOperator", { sourceBucketName: "raw" }));
    expect(await ex.extract()).toBeNull();
  });

  test("on complete matches extract", async () => {
    const ex = new S3CopyObjectExtractor();
    ex.bind(makeOperator("S3CopyObjectOperator", COPY_CONFIG));
    expect(await runExtractOnComplete(ex, makeRun({ etag: "abc" }))).toEqual(await ex.extract());
  });
});

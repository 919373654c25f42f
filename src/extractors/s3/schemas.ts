/**
 * Zod schemas for S3 copy operator configuration.
 */
import { z } from "zod";

export const S3CopyConfigSchema = z.object({
  sourceBucketName: z.string().min(1),
  sourceBucketKey: z.string().min(1),
  destBucketName: z.string().min(1),
  destBucketKey: z.string().min(1),
});

export type S3CopyConfig = z.infer<typeof S3CopyConfigSchema>;

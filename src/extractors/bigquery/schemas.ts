/**
 * Zod schemas for BigQuery operator configuration and job results.
 */
import { z } from "zod";

/** `project.dataset.table`, optionally backtick-quoted. */
export const TableIdSchema = z
  .string()
  .transform((s) => s.trim().replace(/^`|`$/g, ""))
  .pipe(z.string().regex(/^[\w-]+\.\w+\.[\w$*-]+$/));

export const BigQueryConfigSchema = z.object({
  sql: z.string().optional().nullable(),
  sourceTable: TableIdSchema.optional().nullable(),
  destinationTable: TableIdSchema.optional().nullable(),
  location: z.string().optional().nullable(),
  labels: z.record(z.string()).optional().nullable(),
});

/** Job result fields, each read on its own; an unreadable one is left out. */
export const BigQueryJobIdSchema = z.string().min(1);

export const BytesProcessedSchema = z
  .union([z.number(), z.string().regex(/^\d+$/)])
  .pipe(z.coerce.number().int().nonnegative());

export const CachedSchema = z.boolean();

export const LabelsSchema = z.record(z.unknown());

export type BigQueryConfig = z.infer<typeof BigQueryConfigSchema>;

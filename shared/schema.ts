import { z } from "zod";

// Query request
export const queryRequestSchema = z.object({
  question: z.string().trim().min(1, "Question is required").max(1000),
});

// Result table as sent over the wire (dates as ISO strings, missing/NaN as null)
export const serializedTableSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.record(z.union([z.string(), z.number(), z.null()]))),
});

// Query response
export const queryResponseSchema = z.object({
  explanation: z.string(),
  table: serializedTableSchema.nullable(),
});

export type QueryResponse = z.infer<typeof queryResponseSchema>;

// Data Summary
export const dataSummarySchema = z.object({
  totalSamples: z.number(),
  totalSites: z.number(),
  dateRange: z.object({
    start: z.string().nullable(),
    end: z.string().nullable(),
  }),
  yearsCovered: z.array(z.number()),
  columnCount: z.number(),
  columns: z.array(z.string()),
});

export type DataSummary = z.infer<typeof dataSummarySchema>;

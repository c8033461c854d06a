import { z } from 'zod';

// [x0, y0, x1, y1], top-left origin
const bboxTuple = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const dumpTextBlockSchema = z.object({
  bbox: bboxTuple,
  text: z.string(),
  font_size: z.number().positive().optional(),
  bold: z.boolean().optional(),
});

export const dumpTableSchema = z.object({
  bbox: bboxTuple,
  rows: z.array(z.array(z.string().nullable())),
  header_rows: z.number().int().positive().optional(),
});

export const dumpImageSchema = z.object({
  bbox: bboxTuple,
  width: z.number().nonnegative().optional(),
  height: z.number().nonnegative().optional(),
});

export const dumpPageSchema = z.object({
  page: z.number().int().positive(),
  width: z.number().positive(),
  height: z.number().positive(),
  blocks: z.array(dumpTextBlockSchema).default([]),
  tables: z.array(dumpTableSchema).default([]),
  drawings: z.array(bboxTuple).default([]),
  images: z.array(dumpImageSchema).default([]),
  error: z.string().optional(),
});

export const dumpTocEntrySchema = z.object({
  level: z.number().int().positive(),
  title: z.string(),
  page: z.number().int(),
});

export const extractionDumpSchema = z.object({
  source: z.string().min(1),
  version: z.string().min(1).optional(),
  page_count: z.number().int().positive(),
  toc: z.array(dumpTocEntrySchema).default([]),
  pages: z.array(dumpPageSchema),
});

export type ExtractionDump = z.infer<typeof extractionDumpSchema>;
export type ExtractionDumpInput = z.input<typeof extractionDumpSchema>;
export type DumpPage = z.infer<typeof dumpPageSchema>;

import { z } from 'zod';

const points = z.number().nonnegative();

export const configSchema = z.object({
  runtime: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  document: z.object({
    title: z.string().min(1).optional(),
    version: z.string().min(1).optional(),
  }),
  extraction: z.object({
    headerMarginPt: points.default(0),
    footerMarginPt: points.default(0),
    clusterPaddingPt: points.default(4),
    prefetchPages: z.number().int().positive().default(4),
    noisePatterns: z.array(z.string().min(1)).default([]),
  }),
  classification: z.object({
    containmentTolerancePt: points.default(2),
    minFigureArea: points.default(5000),
    definitionSectionKeywords: z
      .array(z.string().min(1))
      .default(['definition', 'abbreviation', 'glossary']),
    minColumnBlocks: z.number().int().positive().default(3),
  }),
  chunking: z.object({
    tokenizer: z.enum(['tiktoken', 'chars']).default('tiktoken'),
    highWaterTokens: z.number().int().positive().default(800),
    textCeilingTokens: z.number().int().positive().default(1200),
    registerCeilingTokens: z.number().int().positive().default(1200),
    overlapTokens: z.number().int().nonnegative().default(0),
  }),
  table: z.object({
    maxChars: z.number().int().positive().default(6000),
    edgeTolerancePt: points.default(10),
    captionMarginPt: points.default(60),
    noteMarkers: z.array(z.string().min(1)).default(['NOTE']),
    rowGroupChunks: z.boolean().default(false),
  }),
  figure: z.object({
    captionMarginPt: points.default(40),
  }),
  output: z.object({
    dir: z.string().min(1).default('data/processed'),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type ExtractionConfig = Config['extraction'];
export type ClassificationConfig = Config['classification'];
export type ChunkingConfig = Config['chunking'];
export type TableConfig = Config['table'];
export type FigureConfig = Config['figure'];

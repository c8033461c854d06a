import 'dotenv/config';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

const int = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const list = (value: string | undefined, separator = ','): string[] | undefined =>
  value
    ? value
        .split(separator)
        .map(item => item.trim())
        .filter(item => item.length > 0)
    : undefined;

const flag = (value: string | undefined): boolean | undefined =>
  value === undefined ? undefined : value === 'true';

export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

function loadConfig(): Config {
  const rawConfig = {
    runtime: {
      nodeEnv: process.env.NODE_ENV,
      logLevel: process.env.LOG_LEVEL,
    },
    document: {
      title: process.env.DOCUMENT_TITLE || undefined,
      version: process.env.DOCUMENT_VERSION || undefined,
    },
    extraction: {
      headerMarginPt: float(process.env.EXTRACTION_HEADER_MARGIN_PT),
      footerMarginPt: float(process.env.EXTRACTION_FOOTER_MARGIN_PT),
      clusterPaddingPt: float(process.env.DRAWING_CLUSTER_PADDING_PT),
      prefetchPages: int(process.env.EXTRACTION_PREFETCH_PAGES),
      noisePatterns: list(process.env.EXTRACTION_NOISE_PATTERNS, ';;'),
    },
    classification: {
      containmentTolerancePt: float(process.env.CONTAINMENT_TOLERANCE_PT),
      minFigureArea: float(process.env.MIN_FIGURE_AREA),
      definitionSectionKeywords: list(process.env.DEFINITION_SECTION_KEYWORDS),
      minColumnBlocks: int(process.env.MIN_COLUMN_BLOCKS),
    },
    chunking: {
      tokenizer: process.env.TOKENIZER,
      highWaterTokens: int(process.env.CHUNK_HIGH_WATER_TOKENS),
      textCeilingTokens: int(process.env.CHUNK_TEXT_CEILING_TOKENS),
      registerCeilingTokens: int(process.env.REGISTER_CEILING_TOKENS),
      overlapTokens: int(process.env.CHUNK_OVERLAP_TOKENS),
    },
    table: {
      maxChars: int(process.env.TABLE_MAX_CHARS),
      edgeTolerancePt: float(process.env.TABLE_EDGE_TOLERANCE_PT),
      captionMarginPt: float(process.env.TABLE_CAPTION_MARGIN_PT),
      noteMarkers: list(process.env.TABLE_NOTE_MARKERS),
      rowGroupChunks: flag(process.env.TABLE_ROW_GROUP_CHUNKS),
    },
    figure: {
      captionMarginPt: float(process.env.FIGURE_CAPTION_MARGIN_PT),
    },
    output: {
      dir: process.env.OUTPUT_DIR || undefined,
    },
  };

  try {
    return parseConfig(rawConfig);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('\n❌ Invalid configuration:\n');
      error.details.forEach(issue => {
        console.error(`  ${issue.field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();

#!/usr/bin/env node
import { config as appConfig } from '../../config/index.js';
import { DocumentUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { argumentError, EXIT_FAILED, EXIT_OK, EXIT_USAGE, parseArgs, summaryFormat } from './args.js';
import { DocumentIngestor } from './index.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import type { IngestConfig, IngestRunResult } from './types.js';

const HELP = `
Spec Chunker - Structure-aware chunking of technical specification PDFs

Usage:
  spec-chunker --input <file|folder> [options]

Options:
  --input <path>       A .pdf, a .json extraction dump, or a folder of them (required)
  --output <dir>       Output directory (default: OUTPUT_DIR or data/processed)
  --tables <path>      Table geometry dump for a single PDF
                       (default: <name>.tables.json next to the PDF, if present)
  --version <tag>      Document version tag (default: derived from the file name)
  --max-pages <n>      Process at most the first n pages
  --format <fmt>       Summary format: table or json (default: table)
  --help               Show this help message

Examples:
  spec-chunker --input ./specs/controller-spec-v2.1.pdf
  spec-chunker --input ./specs --output ./out --format json
  spec-chunker --input ./dumps/controller-spec.json --max-pages 40
`;

const printTable = (result: IngestRunResult): void => {
  const maxName = Math.max(20, ...result.documents.map(doc => doc.fileName.length));
  const header = `${'File'.padEnd(maxName)} | Status    | Pages | Chunks | Terms | Gaps`;
  const separator = '-'.repeat(header.length);

  console.log(separator);
  console.log(header);
  console.log(separator);

  for (const doc of result.documents) {
    const cell = (value: number | undefined, width: number): string => String(value ?? '-').padEnd(width);
    console.log(
      `${doc.fileName.padEnd(maxName)} | ${doc.status.padEnd(9)} | ${cell(doc.pages, 5)} | ${cell(doc.chunks, 6)} | ${cell(doc.glossaryTerms, 5)} | ${cell(doc.gaps, 4)}`
    );
    if (doc.error) console.log(`  ${doc.error}`);
  }
  console.log(separator);
};

const printSummary = (result: IngestRunResult): void => {
  const { summary } = result;
  console.log('\nSummary:');
  console.log(`  Documents: ${summary.total}`);
  console.log(`  Processed: ${summary.processed}`);
  console.log(`  Cancelled: ${summary.cancelled}`);
  console.log(`  Failed:    ${summary.failed}`);
  console.log(`  Chunks:    ${summary.chunks}`);
  console.log('\nBy Type:');
  for (const [type, count] of Object.entries(summary.byType)) {
    if (count > 0) console.log(`  ${type}: ${count}`);
  }
};

const main = async (): Promise<number> => {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    return EXIT_OK;
  }

  const problem = argumentError(args);
  if (problem || !args.input) {
    console.error(`Error: ${problem ?? '--input is required'}`);
    console.log(HELP);
    return EXIT_USAGE;
  }

  const ingestConfig: IngestConfig = {
    input: args.input,
    output: args.output ?? appConfig.output.dir,
    tables: args.tables,
    version: args.version,
    maxPages: args.maxPages,
    format: summaryFormat(args.format),
  };

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, finishing the current page');
    controller.abort();
  });

  const progressReporter = new ProgressReporter(ingestConfig.format !== 'json');
  const ingestor = new DocumentIngestor();

  try {
    logger.info({ input: ingestConfig.input, output: ingestConfig.output }, 'Starting ingestion');
    const result = await ingestor.run(ingestConfig, progressReporter, controller.signal);

    if (ingestConfig.format === 'json') {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\nIngestion Results (${result.documents.length} documents):\n`);
      printTable(result);
      printSummary(result);
    }

    return result.summary.failed > 0 ? EXIT_FAILED : EXIT_OK;
  } catch (error) {
    logger.error({ error }, 'Ingestion failed');
    console.error('Error:', error instanceof Error ? error.message : error);
    if (error instanceof DocumentUnavailableError) return EXIT_FAILED;
    return EXIT_USAGE;
  }
};

main().then(
  code => process.exit(code),
  (error: unknown) => {
    console.error(error);
    process.exit(EXIT_USAGE);
  }
);

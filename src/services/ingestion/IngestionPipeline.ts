import { config } from '../../config/index.js';
import type {
  ChunkingConfig,
  ClassificationConfig,
  ExtractionConfig,
  FigureConfig,
  TableConfig,
} from '../../config/validation.js';
import type { Chunk } from '../../domain/entities/Chunk.js';
import type { PageModel } from '../../domain/entities/PageModel.js';
import type { DocumentStructure } from '../../domain/entities/Section.js';
import { logger } from '../../utils/logger.js';
import { ChunkFactory, sectionContext } from '../chunking/ChunkFactory.js';
import { DefinitionChunker } from '../chunking/DefinitionChunker.js';
import { FigureChunker } from '../chunking/FigureChunker.js';
import { TableChunker } from '../chunking/TableChunker.js';
import { TextChunker } from '../chunking/TextChunker.js';
import { createTokenCounter } from '../chunking/TokenCounter.js';
import type { ChunkDraft, SectionContext, TokenCounter } from '../chunking/types.js';
import { ContentClassifier } from '../classification/ContentClassifier.js';
import type { ClassifiedBlock, LowConfidenceNote } from '../classification/types.js';
import { PageExtractor } from '../extraction/PageExtractor.js';
import type { DocumentSource } from '../extraction/types.js';
import { deriveVersion, documentStem } from '../structure/documentIdentity.js';
import { isTableOfContentsPage, StructureExtractor } from '../structure/StructureExtractor.js';
import { Glossary } from './Glossary.js';
import { PagePrefetcher } from './PagePrefetcher.js';
import { SectionTracker } from './SectionTracker.js';

export interface PipelineOptions {
  extraction?: Partial<ExtractionConfig>;
  classification?: Partial<ClassificationConfig>;
  chunking?: Partial<ChunkingConfig>;
  table?: Partial<TableConfig>;
  figure?: Partial<FigureConfig>;
  /** Overrides the configured tokenizer; the caller keeps ownership. */
  tokenCounter?: TokenCounter;
  title?: string;
  version?: string;
}

export interface PageProgress {
  pageNumber: number;
  lastPage: number;
  status: 'processed' | 'structural' | 'gap';
  chunks: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Process at most this many pages from the start of the document. */
  maxPages?: number;
  onPage?: (progress: PageProgress) => void;
}

export interface PageGap {
  page: number;
  reason: string;
}

export interface Coverage {
  processedPages: number[];
  /** Pages consumed as structure only, such as TOC listings. */
  structuralPages: number[];
  gaps: PageGap[];
  cancelled: boolean;
  /** Last page handled, 0 when none was. */
  lastPage: number;
}

export interface IngestionResult {
  documentId: string;
  source: string;
  title: string;
  version: string;
  totalPages: number;
  bodyStartPage: number;
  chunks: Chunk[];
  glossary: Glossary;
  coverage: Coverage;
  lowConfidence: LowConfidenceNote[];
}

interface Builders {
  text: TextChunker;
  table: TableChunker;
  figure: FigureChunker;
  definition: DefinitionChunker;
}

/** Per-run state threaded through page handling. */
interface RunState {
  structure: DocumentStructure;
  tracker: SectionTracker;
  builders: Builders;
  emitted: ChunkDraft[];
  lowConfidence: LowConfidenceNote[];
}

/**
 * Drives a document through structure extraction, page extraction,
 * classification and the chunk builders. Pages are consumed strictly in
 * order; only extraction runs ahead.
 */
export class IngestionPipeline {
  private readonly classifier: ContentClassifier;
  private readonly structureExtractor = new StructureExtractor();

  constructor(private readonly options: PipelineOptions = {}) {
    this.classifier = new ContentClassifier(options.classification);
  }

  async run(source: DocumentSource, runOptions: RunOptions = {}): Promise<IngestionResult> {
    const startTime = Date.now();
    const totalPages = source.pageCount;
    const lastPage = Math.min(totalPages, runOptions.maxPages ?? totalPages);
    const version =
      this.options.version ?? config.document.version ?? source.version ?? deriveVersion(source.source);
    const title = this.options.title ?? config.document.title ?? documentStem(source.source);

    logger.info({ documentId: source.documentId, source: source.source, totalPages, lastPage }, 'Starting ingestion');

    const toc = await source.readToc();
    const structure = this.structureExtractor.extract(toc, { source: source.source, version, totalPages });

    const counter = this.options.tokenCounter ?? createTokenCounter(this.options.chunking?.tokenizer);
    const factory = new ChunkFactory({ documentId: source.documentId, source: source.source, version, title });
    const state: RunState = {
      structure,
      tracker: new SectionTracker(structure),
      builders: {
        text: new TextChunker(factory, counter, this.options.chunking),
        table: new TableChunker(factory, this.options.table),
        figure: new FigureChunker(factory, this.options.figure),
        definition: new DefinitionChunker(factory),
      },
      emitted: [],
      lowConfidence: [],
    };

    const coverage: Coverage = { processedPages: [], structuralPages: [], gaps: [], cancelled: false, lastPage: 0 };
    const extractor = new PageExtractor(source, this.options.extraction);
    const window = this.options.extraction?.prefetchPages ?? config.extraction.prefetchPages;
    const prefetcher = new PagePrefetcher(pageNumber => extractor.extract(pageNumber), 1, lastPage, window);

    try {
      for await (const outcome of prefetcher.pages()) {
        if (runOptions.signal?.aborted) {
          coverage.cancelled = true;
          logger.warn({ documentId: source.documentId, nextPage: outcome.pageNumber }, 'Ingestion cancelled');
          break;
        }

        const before = state.emitted.length;
        let status: PageProgress['status'];

        if (!outcome.ok) {
          coverage.gaps.push({ page: outcome.pageNumber, reason: outcome.reason });
          logger.warn({ page: outcome.pageNumber, reason: outcome.reason }, 'Page extraction failed, skipping');
          status = 'gap';
        } else if (isTableOfContentsPage(outcome.page, structure)) {
          coverage.structuralPages.push(outcome.pageNumber);
          logger.debug({ page: outcome.pageNumber }, 'Table of contents page, no chunks');
          status = 'structural';
        } else {
          this.processPage(outcome.page, state);
          coverage.processedPages.push(outcome.pageNumber);
          status = 'processed';
        }

        coverage.lastPage = outcome.pageNumber;
        runOptions.onPage?.({
          pageNumber: outcome.pageNumber,
          lastPage,
          status,
          chunks: state.emitted.length - before,
        });
      }

      const { builders } = state;
      this.collect(state, builders.text.flush(), builders.table.flush(), builders.definition.flush());

      const drafts = this.withInlineDefinitions(state.emitted, builders.definition);
      const chunks = this.finalize(drafts, source.documentId, source.source, version);
      const glossary = this.buildGlossary(drafts);

      logger.info(
        {
          documentId: source.documentId,
          chunks: chunks.length,
          glossaryTerms: glossary.size,
          gaps: coverage.gaps.length,
          cancelled: coverage.cancelled,
          processingTime: `${((Date.now() - startTime) / 1000).toFixed(1)}s`,
        },
        'Ingestion complete'
      );

      return {
        documentId: source.documentId,
        source: source.source,
        title,
        version,
        totalPages,
        bodyStartPage: structure.bodyStartPage,
        chunks,
        glossary,
        coverage,
        lowConfidence: state.lowConfidence,
      };
    } finally {
      if (!this.options.tokenCounter) counter.dispose();
    }
  }

  private processPage(page: PageModel, state: RunState): void {
    const { tracker, builders, structure } = state;
    const pageNumber = page.pageNumber;
    const mapped = structure.pageToSection.get(pageNumber) ?? null;

    tracker.beginPage(page);
    const classified = this.classifier.classify(page, mapped);
    state.lowConfidence.push(...classified.lowConfidence);

    this.collect(state, builders.table.beginPage(pageNumber));

    let firstTable = true;
    for (const item of classified.items) {
      const section = this.context(state);

      switch (item.contentType) {
        case 'table':
          this.collect(
            state,
            builders.table.consume(item.region, {
              page: pageNumber,
              section,
              order: item.order,
              pageBlocks: page.blocks,
              firstOnPage: firstTable,
            })
          );
          firstTable = false;
          break;
        case 'figure':
          this.collect(
            state,
            builders.figure.figure(item.region, item.annotations, {
              page: pageNumber,
              section,
              order: item.order,
              pageBlocks: page.blocks,
            })
          );
          break;
        case 'bitmap':
          this.collect(
            state,
            builders.figure.bitmap(item.region, { page: pageNumber, section, order: item.order, pageBlocks: page.blocks })
          );
          break;
        default:
          this.routeBlock(item, pageNumber, state);
      }
    }

    logger.debug(
      {
        page: pageNumber,
        items: classified.items.length,
        twoColumn: classified.twoColumn,
        demotedTables: classified.demotedTables,
        section: this.context(state).label,
      },
      'Page processed'
    );
  }

  /** Text-like blocks go to the definition or text builder depending on the running section. */
  private routeBlock(item: ClassifiedBlock, pageNumber: number, state: RunState): void {
    const { tracker, builders } = state;
    const tocOnly = item.contentType === 'definition' || this.classifier.isDefinitionSection(tracker.current);
    const heading = tracker.observe(item.block, { tocOnly });
    const section = this.context(state);

    const pendingDefinitions = builders.definition.state;
    if (pendingDefinitions && pendingDefinitions.section.key !== section.key) {
      this.collect(state, builders.definition.flush());
    }

    if (heading === null && this.classifier.isDefinitionSection(tracker.current)) {
      this.collect(
        state,
        builders.definition.consume({ text: item.block.text, section, page: pageNumber, order: item.order })
      );
      return;
    }

    const contentType =
      item.contentType === 'definition' ? this.classifier.classifyBlockText(item.block) : item.contentType;
    this.collect(
      state,
      builders.text.consume({
        text: item.block.text,
        contentType,
        section,
        page: pageNumber,
        order: item.order,
        headingLevel: heading && !section.isFrontMatter ? heading.level : null,
      })
    );
  }

  private context(state: RunState): SectionContext {
    return sectionContext(state.tracker.current, state.structure.bodyStartPage);
  }

  private collect(state: RunState, ...batches: ChunkDraft[][]): void {
    for (const batch of batches) state.emitted.push(...batch);
  }

  /** Flags prose chunks that carry inline definitions and appends a definition chunk per match. */
  private withInlineDefinitions(emitted: readonly ChunkDraft[], definitions: DefinitionChunker): ChunkDraft[] {
    const inline: ChunkDraft[] = [];
    const flagged = emitted.map(draft => {
      if (draft.contentType !== 'text' || draft.section.isFrontMatter) return draft;
      const found = definitions.extractInline(draft);
      if (found.length === 0) return draft;
      inline.push(...found);
      return { ...draft, hasInlineDefinition: true };
    });

    if (inline.length > 0) logger.debug({ count: inline.length }, 'Inline definitions extracted');
    return [...flagged, ...inline];
  }

  /** Orders by start page, then reading order on that page, then emission order. */
  private finalize(drafts: readonly ChunkDraft[], documentId: string, source: string, version: string): Chunk[] {
    const ordered = drafts
      .map((draft, sequence) => ({ draft, sequence }))
      .sort(
        (a, b) =>
          a.draft.pageStart - b.draft.pageStart ||
          a.draft.anchor - b.draft.anchor ||
          a.sequence - b.sequence
      );

    const perSection = new Map<string, number>();
    return ordered.map(({ draft }) => {
      const chunkIndex = perSection.get(draft.section.key) ?? 0;
      perSection.set(draft.section.key, chunkIndex + 1);

      const {
        section,
        anchor: _anchor,
        definition: _definition,
        chunkId,
        contentType,
        headingLevel,
        pageStart,
        pageEnd,
        text,
        rawText,
        ...optional
      } = draft;

      const chunk: Chunk = {
        chunkId,
        documentId,
        source,
        version,
        pageStart,
        pageEnd,
        sectionPath: Object.freeze([...section.path]),
        sectionTitle: section.title,
        headingLevel,
        contentType,
        isFrontMatter: section.isFrontMatter,
        chunkIndex,
        text,
        rawText,
        ...optional,
      };
      return Object.freeze(chunk);
    });
  }

  /** Definition drafts in production order, so a later entry replaces an earlier one. */
  private buildGlossary(drafts: readonly ChunkDraft[]): Glossary {
    const glossary = new Glossary();
    for (const draft of drafts) {
      if (draft.contentType !== 'definition' || !draft.term || draft.definition === undefined) continue;
      glossary.add({
        term: draft.term,
        definition: draft.definition,
        chunkId: draft.chunkId,
        page: draft.pageStart,
        sectionPath: draft.section.path,
      });
    }
    return glossary;
  }
}

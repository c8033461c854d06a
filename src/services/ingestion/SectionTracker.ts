import type { PageModel, TextBlock } from '../../domain/entities/PageModel.js';
import {
  normalizeLabel,
  sectionLabel,
  type DocumentStructure,
  type SectionNode,
} from '../../domain/entities/Section.js';
import { logger } from '../../utils/logger.js';

const NUMBERED_HEADING = /^(\d+(?:\.\d+)*)\.?\s+\S/;
const SUBHEADING_NUMBER = /^\d+(?:\.\d+)+$/;
const MAX_HEADING_CHARS = 120;
const MIN_PREFIX_LABEL = 4;
const HEADING_FONT_RATIO = 1.15;
const MAX_UNHINTED_HEADING_CHARS = 80;

export interface HeadingMatch {
  /** The TOC section the heading opens, null for a numbered heading the TOC does not list. */
  readonly section: SectionNode | null;
  readonly level: number;
}

export interface HeadingOptions {
  /** Only accept headings that match a TOC entry. */
  tocOnly?: boolean;
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Follows the running section through the page stream. A section listed in
 * the TOC takes effect at its heading when the heading can be found on its
 * start page, otherwise at the top of that page.
 */
export class SectionTracker {
  private running: SectionNode | null = null;
  private pageNumber = 0;
  private candidates: SectionNode[] = [];
  private bodyFontSize = 0;

  constructor(private readonly structure: DocumentStructure) {}

  get current(): SectionNode | null {
    return this.running;
  }

  beginPage(page: PageModel): SectionNode | null {
    this.pageNumber = page.pageNumber;
    this.candidates = this.structure.sections.filter(section => section.pageStart === page.pageNumber);
    this.bodyFontSize = median(
      page.blocks.map(block => block.fontSize).filter((size): size is number => size !== undefined)
    );

    const mapped = this.structure.pageToSection.get(page.pageNumber) ?? null;
    const headingOnPage = page.blocks.some(block => this.matchTocHeading(block) !== null);

    if (headingOnPage) {
      logger.trace({ page: page.pageNumber }, 'Section heading on page, switching at the heading');
    } else {
      this.running = mapped;
    }
    return this.running;
  }

  /** Heading match for a block, switching the running section when it opens a TOC section. */
  observe(block: TextBlock, options: HeadingOptions = {}): HeadingMatch | null {
    const match = this.matchHeading(block, options);
    if (match?.section && match.section !== this.running) {
      logger.trace(
        { page: this.pageNumber, section: sectionLabel(match.section) },
        'Section heading found'
      );
      this.running = match.section;
    }
    return match;
  }

  matchHeading(block: TextBlock, options: HeadingOptions = {}): HeadingMatch | null {
    const section = this.matchTocHeading(block);
    if (section) return { section, level: section.level };
    if (options.tocOnly) return null;

    const text = block.text.trim();
    if (text.includes('\n') || text.length > MAX_HEADING_CHARS) return null;

    const number = NUMBERED_HEADING.exec(text)?.[1];
    if (!number || !SUBHEADING_NUMBER.test(number)) return null;
    // A number the TOC lists elsewhere is a cross reference, not a heading
    if (this.structure.numberToSection.has(number)) return null;
    if (!this.looksLikeHeading(block)) return null;

    return { section: null, level: number.split('.').length };
  }

  private matchTocHeading(block: TextBlock): SectionNode | null {
    if (this.candidates.length === 0) return null;

    const firstLine = normalizeLabel(block.text.split('\n')[0] ?? '');
    const whole = normalizeLabel(block.text);
    if (!firstLine) return null;

    for (const section of this.candidates) {
      const labels = [sectionLabel(section), section.title]
        .map(normalizeLabel)
        .filter(label => label.length > 0);
      if (labels.includes(firstLine)) return section;
      if (labels.some(label => label.length >= MIN_PREFIX_LABEL && whole.startsWith(`${label} `))) {
        return section;
      }
    }
    return null;
  }

  private looksLikeHeading(block: TextBlock): boolean {
    if (block.bold) return true;
    if (block.fontSize !== undefined && this.bodyFontSize > 0) {
      return block.fontSize >= this.bodyFontSize * HEADING_FONT_RATIO;
    }
    // No font hints: a short line without closing punctuation
    const text = block.text.trim();
    return block.bold === undefined && text.length <= MAX_UNHINTED_HEADING_CHARS && !/[.,;:]$/.test(text);
  }
}

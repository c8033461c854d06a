import {
  normalizeLabel,
  sectionLabel,
  type DocumentStructure,
  type SectionNode,
  type TocEntry,
} from '../../domain/entities/Section.js';
import type { PageModel } from '../../domain/entities/PageModel.js';
import { logger } from '../../utils/logger.js';

const SECTION_NUMBER = /^(\d+(?:\.\d+)*)\.?\s+(.*)$/;

const FRONT_MATTER_TITLES = [
  'cover',
  'contents',
  'table of contents',
  'list of figures',
  'list of tables',
  'figures',
  'tables',
  'foreword',
  'preface',
  'introduction',
  'revision history',
  'document history',
];

const TOC_HEADING = /^(table of contents|contents|list of (figures|tables))$/i;
const TOC_LINE = /\S.*?(\.{2,}|\s)\s*\d{1,4}$/;

export interface DocumentInfo {
  source: string;
  version: string;
  totalPages: number;
}

export function parseSectionNumber(title: string): { number: string; title: string } {
  const match = title.trim().match(SECTION_NUMBER);
  if (!match) return { number: '', title: title.trim() };
  return { number: match[1], title: match[2].trim() };
}

export function numberPath(number: string): string[] {
  const parts = number.split('.');
  return parts.map((_, i) => parts.slice(0, i + 1).join('.'));
}

/** Unnumbered entries such as "Foreword"; a numbered "1 Introduction" is body. */
const isFrontMatterEntry = (title: string): boolean => {
  const parsed = parseSectionNumber(title);
  return !parsed.number && FRONT_MATTER_TITLES.includes(normalizeLabel(parsed.title));
};

/**
 * Builds the section tree from the document's native TOC, maps every page to
 * its governing section and finds where the body starts.
 */
export class StructureExtractor {
  extract(toc: readonly TocEntry[], info: DocumentInfo): DocumentStructure {
    const entries = this.sanitize(toc, info.totalPages);

    const root: SectionNode = {
      id: 0,
      level: 0,
      title: '',
      number: '',
      path: [],
      pageStart: 1,
      pageEnd: info.totalPages,
      isFrontMatter: false,
      parent: null,
      children: [],
    };

    if (entries.length === 0) {
      logger.warn({ source: info.source }, 'No usable TOC, treating the document as one section');
      const only: SectionNode = {
        id: 1,
        level: 1,
        title: '',
        number: '',
        path: ['0'],
        pageStart: 1,
        pageEnd: info.totalPages,
        isFrontMatter: false,
        parent: root,
        children: [],
      };
      root.children.push(only);
      return this.assemble(root, [only], 1, false, info);
    }

    const bodyStartPage = this.findBodyStart(entries);
    const sections: SectionNode[] = [];
    const stack: SectionNode[] = [];

    entries.forEach((entry, i) => {
      while (stack.length > 0 && stack[stack.length - 1].level >= entry.level) {
        stack.pop();
      }
      const parent = stack.length > 0 ? stack[stack.length - 1] : root;
      const parsed = parseSectionNumber(entry.title);

      const node: SectionNode = {
        id: i + 1,
        level: entry.level,
        title: parsed.title,
        number: parsed.number,
        path: parsed.number ? numberPath(parsed.number) : [...parent.path, parsed.title],
        pageStart: entry.page,
        pageEnd: this.pageEnd(entries, i, info.totalPages),
        isFrontMatter: entry.page < bodyStartPage,
        parent,
        children: [],
      };

      parent.children.push(node);
      stack.push(node);
      sections.push(node);
    });

    logger.info(
      { source: info.source, sections: sections.length, bodyStartPage },
      'Document structure extracted'
    );

    return this.assemble(root, sections, bodyStartPage, true, info);
  }

  private sanitize(toc: readonly TocEntry[], totalPages: number): TocEntry[] {
    const entries: TocEntry[] = [];
    let previousLevel = 0;

    for (const entry of toc) {
      const title = entry.title.replace(/\s+/g, ' ').trim();
      if (!title) continue;

      let page = entry.page;
      if (page < 1 || page > totalPages) {
        logger.warn({ title, page, totalPages }, 'TOC entry targets a page outside the document, clamping');
        page = Math.min(Math.max(page, 1), totalPages);
      }

      // A child can only sit one level below its parent
      const level = Math.max(1, Math.min(entry.level, previousLevel + 1));
      entries.push({ level, title, page });
      previousLevel = level;
    }

    return entries;
  }

  private pageEnd(entries: readonly TocEntry[], index: number, totalPages: number): number {
    const entry = entries[index];
    for (let j = index + 1; j < entries.length; j++) {
      if (entries[j].level <= entry.level) {
        return Math.max(entry.page, entries[j].page - 1);
      }
    }
    return totalPages;
  }

  private findBodyStart(entries: readonly TocEntry[]): number {
    const topLevel = entries.filter(entry => entry.level === 1);
    const body = topLevel.find(entry => !isFrontMatterEntry(entry.title));
    return (body ?? topLevel[0] ?? entries[0]).page;
  }

  private assemble(
    root: SectionNode,
    sections: SectionNode[],
    bodyStartPage: number,
    hasToc: boolean,
    info: DocumentInfo
  ): DocumentStructure {
    const pageToSection = new Map<number, SectionNode>();
    for (let page = 1; page <= info.totalPages; page++) {
      let governing: SectionNode | undefined;
      for (const section of sections) {
        if (section.pageStart <= page) governing = section;
      }
      if (governing) pageToSection.set(page, governing);
    }

    const labelToSection = new Map<string, SectionNode>();
    const numberToSection = new Map<string, SectionNode>();
    for (const section of sections) {
      if (section.title || section.number) {
        const label = normalizeLabel(sectionLabel(section));
        if (!labelToSection.has(label)) labelToSection.set(label, section);
      }
      if (section.number && !numberToSection.has(section.number)) {
        numberToSection.set(section.number, section);
      }
    }

    return {
      source: info.source,
      version: info.version,
      totalPages: info.totalPages,
      bodyStartPage,
      hasToc,
      root,
      sections,
      pageToSection,
      labelToSection,
      numberToSection,
    };
  }
}

/**
 * A front-matter page that lists the TOC (or a list of figures or tables):
 * either headed as such, or made up mostly of "title ... page" lines.
 */
export function isTableOfContentsPage(page: PageModel, structure: DocumentStructure): boolean {
  if (!structure.hasToc || page.pageNumber >= structure.bodyStartPage) return false;

  const lines = page.blocks
    .flatMap(block => block.text.split('\n'))
    .map(line => line.trim())
    .filter(line => line.length > 0);
  if (lines.length === 0) return false;

  if (lines.some(line => TOC_HEADING.test(line))) return true;

  const tocLines = lines.filter(line => TOC_LINE.test(line)).length;
  return tocLines >= 3 && tocLines / lines.length >= 0.5;
}

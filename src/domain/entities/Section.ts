export interface TocEntry {
  level: number;
  title: string;
  page: number;
}

export interface SectionNode {
  readonly id: number;
  /** 1-5 for TOC entries, 0 for the synthetic root. */
  readonly level: number;
  readonly title: string;
  /** Dotted section number parsed from the title, '' when the title has none. */
  readonly number: string;
  readonly path: readonly string[];
  readonly pageStart: number;
  readonly pageEnd: number;
  readonly isFrontMatter: boolean;
  readonly parent: SectionNode | null;
  readonly children: SectionNode[];
}

export interface DocumentStructure {
  readonly source: string;
  readonly version: string;
  readonly totalPages: number;
  readonly bodyStartPage: number;
  readonly hasToc: boolean;
  readonly root: SectionNode;
  /** Sections in TOC order, root excluded. */
  readonly sections: readonly SectionNode[];
  readonly pageToSection: ReadonlyMap<number, SectionNode>;
  readonly labelToSection: ReadonlyMap<string, SectionNode>;
  readonly numberToSection: ReadonlyMap<string, SectionNode>;
}

export function sectionLabel(section: SectionNode | null | undefined): string {
  if (!section) return '(front matter)';
  if (section.number && section.title) return `${section.number} ${section.title}`;
  return section.title || section.number || '(document)';
}

export function normalizeLabel(label: string): string {
  return label
    .toLowerCase()
    .replace(/[\u2010-\u2015]/g, '-')
    .replace(/\s+/g, ' ')
    .replace(/^[\s.]+|[\s.]+$/g, '');
}

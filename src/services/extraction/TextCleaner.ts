const CHARACTER_MAP: ReadonlyArray<[RegExp, string]> = [
  [/\u00a0/g, ' '],
  [/[\u2010-\u2015\u2212]/g, '-'],
  [/[\u2018\u2019\u201a\u2032]/g, "'"],
  [/[\u201c\u201d\u201e\u2033]/g, '"'],
  [/[\u00b5\u03bc]/g, 'u'],
  [/\u00b1/g, '+/-'],
  [/\u00b0/g, 'deg'],
  [/\u2264/g, '<='],
  [/\u2265/g, '>='],
  [/\u00d7/g, 'x'],
  [/[\u2022\u25cf\u25aa]/g, '*'],
  [/\u2026/g, '...'],
  [/[\u200b-\u200d\ufeff]/g, ''],
];

/**
 * Normalizes extracted text: typographic characters to ASCII, configurable
 * noise removal (running headers, watermarks) and whitespace collapsing.
 * Line breaks are kept.
 */
export class TextCleaner {
  private readonly noise: RegExp[];

  constructor(noisePatterns: readonly string[] = []) {
    this.noise = noisePatterns.map(pattern => new RegExp(pattern, 'gi'));
  }

  clean(text: string): string {
    let result = text;

    for (const pattern of this.noise) {
      result = result.replace(pattern, '');
    }
    for (const [pattern, replacement] of CHARACTER_MAP) {
      result = result.replace(pattern, replacement);
    }

    return result
      .replace(/\r\n?/g, '\n')
      .replace(/\(\s*\)|\[\s*\]/g, '')
      .replace(/[ \t]+/g, ' ')
      .replace(/ *\n */g, '\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  cleanCell(cell: string | null): string | null {
    if (cell === null) return null;
    const cleaned = this.clean(cell);
    return cleaned.length > 0 ? cleaned : null;
  }
}

const VERSION_PATTERNS: ReadonlyArray<[RegExp, (match: RegExpMatchArray) => string]> = [
  [/(?:^|[\s_-])v(?:er(?:sion)?)?[\s_-]?(\d+(?:[._]\d+)*)/i, match => match[1].replace(/_/g, '.')],
  // Revision codes such as "B51" read as 5.1
  [/(?:^|[^A-Za-z\d])B(\d)(\d+)(?![\d])/, match => `${match[1]}.${match[2]}`],
  [/(\d+\.\d+(?:\.\d+)*)/, match => match[1]],
];

export function documentStem(fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  return base.replace(/(\.tables)?\.(pdf|json)$/i, '');
}

export function deriveVersion(fileName: string): string {
  const stem = documentStem(fileName);
  for (const [pattern, format] of VERSION_PATTERNS) {
    const match = stem.match(pattern);
    if (match) return format(match);
  }
  return 'unknown';
}

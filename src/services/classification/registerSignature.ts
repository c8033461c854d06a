const BIT_RANGE = /\[\d+(?::\d+)?\]/;

const ACCESS_KEYWORDS =
  /(^|[\s(,;/])(r\/w(\/[a-z_]+)?|r\/wp|ro|wo|rw|rw1c|w1c|otp|read\/write|read only|write only|write once|reserved)(?=$|[\s),;./])/i;

// "0x1: ...", "01b = ...", "3h - ...", "0: ..."
const ENUMERATED_VALUE =
  /(?:^|[\n;,]\s*|\s{2,})(?:0x[0-9a-f]+|[01]+b|[0-9a-f]+h|\d+)\s*(?::|=|-|\u2013)\s*\S/gi;

export function hasBitRange(text: string): boolean {
  return BIT_RANGE.test(text);
}

export function enumeratedValueCount(text: string): number {
  return text.match(ENUMERATED_VALUE)?.length ?? 0;
}

/**
 * A register bit-field definition: a bracketed bit-range token together with
 * an enumerated value list or register access keywords.
 */
export function isRegisterText(text: string): boolean {
  if (!hasBitRange(text)) return false;
  return enumeratedValueCount(text) >= 2 || ACCESS_KEYWORDS.test(text);
}

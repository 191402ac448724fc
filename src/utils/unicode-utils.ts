// The pneumata marks are script Inherited but named COMBINING CYRILLIC.
const CYRILLIC_CHAR = /^[\p{Script=Cyrillic}\u0485\u0486]$/u;

export function isCyrillic(char: string): boolean {
  return CYRILLIC_CHAR.test(char);
}

export function collectCyrillicCharacters(texts: Iterable<string>): Set<string> {
  const characters = new Set<string>();

  for (const text of texts) {
    // for...of walks code points, so astral characters stay whole.
    for (const char of text) {
      if (isCyrillic(char)) {
        characters.add(char);
      }
    }
  }

  return characters;
}

export function codePointOf(char: string): number {
  return char.codePointAt(0) ?? 0;
}

export function sortByCodePoint(chars: Iterable<string>): string[] {
  return Array.from(chars).sort((a, b) => codePointOf(a) - codePointOf(b));
}

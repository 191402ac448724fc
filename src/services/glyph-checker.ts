import fs from 'fs-extra';
import opentype, { type Font } from 'opentype.js';
import { VerificationError, describeError } from '../errors';
import { sortByCodePoint } from '../utils/unicode-utils';

export async function loadFont(fontPath: string): Promise<Font> {
  const fontBuffer = await fs.readFile(fontPath);

  try {
    // Buffers can share a pooled ArrayBuffer, so hand opentype.js an exact copy.
    const arrayBuffer = fontBuffer.buffer.slice(fontBuffer.byteOffset, fontBuffer.byteOffset + fontBuffer.byteLength);
    return opentype.parse(arrayBuffer);
  } catch (error) {
    throw new VerificationError(`Could not parse font at ${fontPath}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Returns the characters that the font's best cmap subtable does not map to a
 * real glyph, in code point order. Glyph 0 is `.notdef`, which counts as missing.
 */
export function findMissingGlyphs(font: Font, requiredChars: Iterable<string>): string[] {
  return sortByCodePoint(requiredChars).filter((char) => !(font.charToGlyphIndex(char) > 0));
}

export async function verifyFontContains(fontPath: string, requiredChars: Set<string>): Promise<void> {
  const font = await loadFont(fontPath);
  const missing = findMissingGlyphs(font, requiredChars);

  if (missing.length > 0) {
    throw new VerificationError(`${fontPath} is missing glyphs for: ${missing.join('')}`);
  }
}

import fs from 'fs-extra';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { VerificationError } from '../errors';
import { buildTestFont, makeTempDir } from '../testing/fixtures';
import { findMissingGlyphs, loadFont, verifyFontContains } from './glyph-checker';

describe('glyph coverage', () => {
  let root: string;
  let fontPath: string;

  beforeEach(async () => {
    root = await makeTempDir();
    fontPath = path.join(root, 'TestSans.ttf');
    await fs.writeFile(fontPath, buildTestFont('АБ'));
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('lists the characters the character map does not cover', async () => {
    const font = await loadFont(fontPath);

    expect(findMissingGlyphs(font, new Set(['я', 'А', 'Б']))).toEqual(['я']);
    expect(findMissingGlyphs(font, ['Б', 'А'])).toEqual([]);
  });

  it('names the missing character when verification fails', async () => {
    const verification = verifyFontContains(fontPath, new Set(['А', 'Б', 'я']));

    await expect(verification).rejects.toBeInstanceOf(VerificationError);
    await expect(verification).rejects.toThrow(`${fontPath} is missing glyphs for: я`);
  });

  it('passes when every character is mapped', async () => {
    await expect(verifyFontContains(fontPath, new Set(['А', 'Б']))).resolves.toBeUndefined();
  });

  it('reports files that are not fonts', async () => {
    const bogus = path.join(root, 'bogus.ttf');
    await fs.writeFile(bogus, 'definitely not a font file');

    await expect(loadFont(bogus)).rejects.toThrow(`Could not parse font at ${bogus}`);
  });
});

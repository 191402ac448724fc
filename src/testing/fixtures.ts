import fs from 'fs-extra';
import opentype, { type Path } from 'opentype.js';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { FontSource } from '../types/font';
import { sha256Digest } from '../utils/digest';
import { codePointOf } from '../utils/unicode-utils';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'owml-fonts-'));
}

/** Three nested targets laid out like the real mod tree. */
export function targetsIn(root: string): string[] {
  return [
    path.join(root, 'Fonts', 'TestSans.ttf'),
    path.join(root, 'Mods', 'First.Mod', 'Fonts', 'TestSans.ttf'),
    path.join(root, 'Mods', 'Second.Mod', 'Fonts', 'TestSans.ttf'),
  ];
}

export function sourceFor(payload: Uint8Array): FontSource {
  return {
    url: 'https://fonts.example.test/TestSans-Regular.ttf',
    sha256: sha256Digest(payload),
    userAgent: 'test-agent/1.0',
  };
}

export function stubFetch(body: Uint8Array, init?: ResponseInit) {
  const fetchMock = vi.fn(async () => new Response(new Uint8Array(body), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function boxPath(): Path {
  const box = new opentype.Path();
  box.moveTo(100, 0);
  box.lineTo(100, 700);
  box.lineTo(500, 700);
  box.lineTo(500, 0);
  box.close();
  return box;
}

/** A minimal OpenType font with one glyph for each character of `chars`. */
export function buildTestFont(chars: string): Buffer {
  const notdef = new opentype.Glyph({ name: '.notdef', advanceWidth: 650, path: new opentype.Path() });
  const glyphs = Array.from(
    new Set(chars),
    (char, index) =>
      new opentype.Glyph({
        name: `glyph${index + 1}`,
        unicode: codePointOf(char),
        advanceWidth: 600,
        path: boxPath(),
      })
  );

  const font = new opentype.Font({
    familyName: 'Test Sans',
    styleName: 'Regular',
    unitsPerEm: 1000,
    ascender: 800,
    descender: -200,
    glyphs: [notdef, ...glyphs],
  });

  return Buffer.from(font.toArrayBuffer());
}

import * as path from 'path';
import { fileURLToPath } from 'url';
import type { FontSource } from './types/font';
import type { ModTextSource } from './types/mod-text';

export const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

export const FONT_FILENAME = 'NotoSans-Regular.ttf';

export const DEFAULT_FONT_SOURCE: FontSource = {
  url: 'https://github.com/googlefonts/noto-fonts/raw/main/hinted/ttf/NotoSans/NotoSans-Regular.ttf',
  sha256: 'b85c38ecea8a7cfb39c24e395a4007474fa5a4fc864f6ee33309eb4948d232d5',
  userAgent: 'OWML-font-fetcher/1.0',
};

const PATCH_DIR = path.join(REPO_ROOT, 'OWML_fonts_patch');
const CHEATS_MOD_DIR = path.join(PATCH_DIR, 'Mods', 'PacificEngine.CheatsMod');
const CLOCK_MOD_DIR = path.join(PATCH_DIR, 'Mods', 'clubby789.OWClock');

// Order matters: the cache probe takes the first valid copy.
export const FONT_TARGETS: readonly string[] = [
  path.join(PATCH_DIR, 'Fonts', FONT_FILENAME),
  path.join(CHEATS_MOD_DIR, 'Fonts', FONT_FILENAME),
  path.join(CLOCK_MOD_DIR, 'Fonts', FONT_FILENAME),
];

export const MOD_TEXT_SOURCES: readonly ModTextSource[] = [
  { kind: 'settings', path: path.join(CHEATS_MOD_DIR, 'config.json') },
  { kind: 'settings', path: path.join(CLOCK_MOD_DIR, 'config.json') },
  { kind: 'events', path: path.join(CLOCK_MOD_DIR, 'events.json') },
];

/** Always checked, even when the mod text happens to skip some letters. */
export const CYRILLIC_ALPHABET = 'АБВГДЕЁЖЗИЙКЛМНОПРСТУФХЦЧШЩЪЫЬЭЮЯ' + 'абвгдеёжзийклмнопрстуфхцчшщъыьэюя';

import fs from 'fs-extra';
import { DEFAULT_FONT_SOURCE, FONT_TARGETS, MOD_TEXT_SOURCES, CYRILLIC_ALPHABET } from '../config';
import { VerificationError } from '../errors';
import type { InstallOptions } from '../types/font';
import type { ModTextSource } from '../types/mod-text';
import { sha256Digest } from '../utils/digest';
import { silentReporter } from '../utils/reporter';
import { sortByCodePoint } from '../utils/unicode-utils';
import { verifyFontContains } from './glyph-checker';
import { installFonts } from './installer';
import { loadRequiredCharacters } from './mod-text';

export interface VerifyOptions extends Omit<InstallOptions, 'force' | 'dryRun'> {
  textSources?: readonly ModTextSource[];
  referenceText?: string;
}

export interface VerificationReport {
  characters: string[];
  fonts: string[];
}

/**
 * Installs the fonts, then checks that every copy is the pinned font and covers
 * every Cyrillic character the mods display. Stops at the first failure.
 */
export async function verifyGlyphs(options: VerifyOptions = {}): Promise<VerificationReport> {
  const {
    source = DEFAULT_FONT_SOURCE,
    targets = FONT_TARGETS,
    reporter = silentReporter,
    textSources = MOD_TEXT_SOURCES,
    referenceText = CYRILLIC_ALPHABET,
  } = options;

  await installFonts({ source, targets, reporter });

  const required = await loadRequiredCharacters(textSources, referenceText);
  if (required.size === 0) {
    throw new VerificationError('Did not detect any Cyrillic characters to verify.');
  }
  reporter.info(`Checking ${required.size} Cyrillic characters`);

  for (const target of targets) {
    if (!(await fs.pathExists(target))) {
      throw new VerificationError(`Expected font at ${target}`);
    }

    const digest = sha256Digest(await fs.readFile(target));
    if (digest !== source.sha256) {
      throw new VerificationError(`Unexpected font hash at ${target}: ${digest}`);
    }

    await verifyFontContains(target, required);
  }

  reporter.succeed('All fonts include the required Cyrillic glyphs.');

  return { characters: sortByCodePoint(required), fonts: [...targets] };
}

import fs from 'fs-extra';
import type { ZodType, ZodTypeDef } from 'zod';
import { CYRILLIC_ALPHABET, MOD_TEXT_SOURCES } from '../config';
import { VerificationError, describeError } from '../errors';
import { type ModConfig, type ModEvents, type ModTextSource, modConfigSchema, modEventsSchema } from '../types/mod-text';
import { collectCyrillicCharacters } from '../utils/unicode-utils';

/** Top-level string settings, plus the string fields of each nested option object. */
export function extractSettingsText(config: ModConfig): string[] {
  const texts: string[] = [];

  for (const section of Object.values(config.settings ?? {})) {
    if (typeof section === 'string') {
      texts.push(section);
    } else if (isPlainObject(section)) {
      texts.push(...Object.values(section).filter((value): value is string => typeof value === 'string'));
    }
  }

  return texts;
}

export function extractEventNames(events: ModEvents): string[] {
  return (events.eventList ?? []).map((entry) => entry.Name).filter((name): name is string => typeof name === 'string');
}

async function readModJson<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await fs.readJson(filePath, { encoding: 'utf8' });
  } catch (error) {
    throw new VerificationError(`Could not load ${filePath}: ${describeError(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new VerificationError(`Unexpected structure in ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export async function loadModTexts(sources: readonly ModTextSource[] = MOD_TEXT_SOURCES): Promise<string[]> {
  const texts: string[] = [];

  for (const source of sources) {
    switch (source.kind) {
      case 'settings':
        texts.push(...extractSettingsText(await readModJson(source.path, modConfigSchema)));
        break;
      case 'events':
        texts.push(...extractEventNames(await readModJson(source.path, modEventsSchema)));
        break;
    }
  }

  return texts;
}

/** Collects the Cyrillic characters the mods display, plus the reference alphabet. */
export async function loadRequiredCharacters(sources: readonly ModTextSource[] = MOD_TEXT_SOURCES, referenceText: string = CYRILLIC_ALPHABET): Promise<Set<string>> {
  const texts = await loadModTexts(sources);
  texts.push(referenceText);
  return collectCyrillicCharacters(texts);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

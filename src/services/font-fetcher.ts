import { DEFAULT_FONT_SOURCE } from '../config';
import { FetchError, IntegrityError, describeError } from '../errors';
import type { FontSource } from '../types/font';
import { sha256Digest } from '../utils/digest';

/** Downloads the upstream font and validates its checksum. No retries. */
export async function downloadFont(source: FontSource = DEFAULT_FONT_SOURCE): Promise<Buffer> {
  let payload: Buffer;

  try {
    const response = await fetch(source.url, {
      headers: { 'User-Agent': source.userAgent },
    });

    if (!response.ok) {
      throw new FetchError(source.url, `${response.status} ${response.statusText}`);
    }

    payload = Buffer.from(await response.arrayBuffer());
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    throw new FetchError(source.url, describeError(error), { cause: error });
  }

  const digest = sha256Digest(payload);
  if (digest !== source.sha256) {
    throw new IntegrityError(source.sha256, digest);
  }

  return payload;
}

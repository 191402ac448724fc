import fs from 'fs-extra';
import { WriteError, describeError } from '../errors';
import { sha256Digest } from '../utils/digest';
import { type Reporter, silentReporter } from '../utils/reporter';

/**
 * Looks for an already valid copy of the font among `targets`, in order.
 * Unreadable or stale copies are reported and skipped; they get refreshed later.
 */
export async function findCachedFont(targets: readonly string[], expectedDigest: string, reporter: Reporter = silentReporter): Promise<Buffer | undefined> {
  for (const target of targets) {
    if (!(await fs.pathExists(target))) {
      continue;
    }

    let data: Buffer;
    try {
      data = await fs.readFile(target);
    } catch (error) {
      reporter.warn(`could not read ${target}: ${describeError(error)}`);
      continue;
    }

    const digest = sha256Digest(data);
    if (digest === expectedDigest) {
      return data;
    }

    reporter.warn(`Existing font at ${target} has unexpected hash (${digest}); replacing.`);
  }

  return undefined;
}

export function tempPathFor(target: string): string {
  return `${target}.tmp`;
}

/** Writes a sibling temp file and renames it over `target`, so readers never see a partial file. */
export async function writeFileAtomic(target: string, data: Uint8Array): Promise<void> {
  const tmpPath = tempPathFor(target);

  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, target);
  } catch (error) {
    const cleanupError = await fs.remove(tmpPath).then(
      () => undefined,
      (reason: unknown) => reason
    );
    const detail = cleanupError === undefined ? describeError(error) : `${describeError(error)} (temp file ${tmpPath} left behind: ${describeError(cleanupError)})`;
    throw new WriteError(target, detail, { cause: error });
  }
}

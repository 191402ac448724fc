import fs from 'fs-extra';
import * as path from 'path';
import { FONT_TARGETS } from '../config';
import { describeError } from '../errors';
import type { InstallReport, TargetResult } from '../types/font';
import { sha256Digest } from '../utils/digest';
import { type Reporter, silentReporter } from '../utils/reporter';
import { writeFileAtomic } from './file-handler';

export interface DistributeOptions {
  expectedDigest: string;
  force?: boolean;
  dryRun?: boolean;
  targets?: readonly string[];
  reporter?: Reporter;
}

export type DistributeReport = Omit<InstallReport, 'origin'>;

/** Copies validated font bytes into every target that is missing, stale, or forced. */
export async function ensureTargets(fontBytes: Uint8Array, options: DistributeOptions): Promise<DistributeReport> {
  const { expectedDigest, force = false, dryRun = false, targets = FONT_TARGETS, reporter = silentReporter } = options;
  const results: TargetResult[] = [];
  let bytesWritten = 0;

  for (const target of targets) {
    if (!dryRun) {
      await fs.ensureDir(path.dirname(target));
    }

    if (!force && (await fs.pathExists(target))) {
      let existing: Buffer | undefined;
      try {
        existing = await fs.readFile(target);
      } catch (error) {
        reporter.warn(`could not read ${target}: ${describeError(error)}`);
      }

      if (existing) {
        if (sha256Digest(existing) === expectedDigest) {
          reporter.info(`${target}: up to date`);
          results.push({ path: target, status: 'up-to-date' });
          continue;
        }
        reporter.info(`${target}: checksum mismatch, refreshing`);
      }
    }

    if (dryRun) {
      reporter.info(`Would write font to ${target}`);
      results.push({ path: target, status: 'would-write' });
      continue;
    }

    await writeFileAtomic(target, fontBytes);
    bytesWritten += fontBytes.byteLength;
    reporter.succeed(`Wrote ${target}`);
    results.push({ path: target, status: 'written' });
  }

  return { targets: results, bytesWritten };
}

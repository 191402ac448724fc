import { z } from 'zod';
import type { Reporter } from '../utils/reporter';

export interface FontSource {
  url: string;
  sha256: string;
  userAgent: string;
}

export type TargetStatus = 'up-to-date' | 'would-write' | 'written';

export interface TargetResult {
  path: string;
  status: TargetStatus;
}

export interface InstallReport {
  /** Where the payload came from; `cache` means a valid copy was already on disk. */
  origin: 'cache' | 'download';
  targets: TargetResult[];
  bytesWritten: number;
}

export interface InstallOptions {
  force?: boolean;
  dryRun?: boolean;
  source?: FontSource;
  targets?: readonly string[];
  reporter?: Reporter;
}

export const installFlagsSchema = z.object({
  force: z.boolean().default(false).describe('Overwrite existing fonts even if the checksum already matches'),
  dryRun: z.boolean().default(false).describe('Display actions without writing any files'),
});

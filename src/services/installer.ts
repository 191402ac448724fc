import { DEFAULT_FONT_SOURCE, FONT_TARGETS } from '../config';
import type { InstallOptions, InstallReport } from '../types/font';
import { silentReporter } from '../utils/reporter';
import { findCachedFont } from './file-handler';
import { ensureTargets } from './font-distributor';
import { downloadFont } from './font-fetcher';

export async function installFonts(options: InstallOptions = {}): Promise<InstallReport> {
  const { force = false, dryRun = false, source = DEFAULT_FONT_SOURCE, targets = FONT_TARGETS, reporter = silentReporter } = options;

  // --force skips the probe so the font is always re-downloaded and re-validated.
  let fontBytes = force ? undefined : await findCachedFont(targets, source.sha256, reporter);
  const origin = fontBytes ? 'cache' : 'download';

  if (!fontBytes) {
    reporter.info(`Downloading ${source.url}`);
    fontBytes = await downloadFont(source);
  }

  const report = await ensureTargets(fontBytes, {
    expectedDigest: source.sha256,
    force,
    dryRun,
    targets,
    reporter,
  });

  return { origin, ...report };
}

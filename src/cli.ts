import { Command } from 'commander';
import { FontInstallError } from './errors';
import { installFonts } from './services/installer';
import { verifyGlyphs, type VerifyOptions } from './services/verifier';
import { installFlagsSchema } from './types/font';
import { type Reporter, createConsoleReporter } from './utils/reporter';

export interface ProgramOptions extends Omit<VerifyOptions, 'reporter'> {
  reporter?: Reporter;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const { reporter = createConsoleReporter(), ...locations } = options;

  const installCommand = new Command('install')
    .description('Fetch the Cyrillic-capable font and copy it into every location expected by OWML and the bundled mods')
    .option('--force', 'overwrite existing fonts even if the checksum already matches', false)
    .option('--dry-run', 'display actions without writing any files', false)
    .action(async (rawFlags: unknown) => {
      const flags = installFlagsSchema.parse(rawFlags);
      await installFonts({ ...locations, ...flags, reporter });
    });

  const verifyCommand = new Command('verify')
    .description('Install the fonts, then check they cover the Cyrillic text used by the mods')
    .action(async () => {
      await verifyGlyphs({ ...locations, reporter });
    });

  return new Command()
    .name('owml-fonts')
    .description('Cyrillic font installer for OWML mods')
    .addCommand(installCommand, { isDefault: true })
    .addCommand(verifyCommand);
}

/** Parses `argv` (user arguments only) and returns the process exit code. */
export async function run(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  const reporter = options.reporter ?? createConsoleReporter();
  const program = createProgram({ ...options, reporter });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof FontInstallError) {
      reporter.fail(error.message);
    } else {
      console.error('Error:', error);
    }
    return 1;
  }
}

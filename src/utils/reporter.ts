import ora from 'ora';

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
}

export interface BufferedReporter extends Reporter {
  readonly lines: string[];
}

/** Terminal output: progress on stdout, warnings and failures on stderr. */
export function createConsoleReporter(): Reporter {
  const out = ora({ stream: process.stdout });
  const diagnostics = ora({ stream: process.stderr });

  return {
    info: (message) => {
      out.info(message);
    },
    warn: (message) => {
      diagnostics.warn(message);
    },
    succeed: (message) => {
      out.succeed(message);
    },
    fail: (message) => {
      diagnostics.fail(message);
    },
  };
}

export function createBufferedReporter(): BufferedReporter {
  const lines: string[] = [];

  return {
    lines,
    info: (message) => lines.push(`• ${message}`),
    warn: (message) => lines.push(`⚠️ ${message}`),
    succeed: (message) => lines.push(`✅ ${message}`),
    fail: (message) => lines.push(`❌ ${message}`),
  };
}

export const silentReporter: Reporter = {
  info: () => undefined,
  warn: () => undefined,
  succeed: () => undefined,
  fail: () => undefined,
};

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { describeError } from '../errors';
import { installFonts } from '../services/installer';
import { installFlagsSchema } from '../types/font';
import { createBufferedReporter } from '../utils/reporter';
import type { ToolContext } from './index';

export function registerInstallFontsTool(server: McpServer, context: ToolContext = {}): void {
  server.tool('install-fonts', 'Download the Cyrillic-capable font and copy it into every mod font directory', installFlagsSchema.shape, async ({ force, dryRun }) => {
    const reporter = createBufferedReporter();

    try {
      const report = await installFonts({ ...context, force, dryRun, reporter });
      const written = report.targets.filter((target) => target.status === 'written').length;

      return {
        content: [
          {
            type: 'text',
            text: `${reporter.lines.join('\n')}\n\n📊 ${written}/${report.targets.length} targets written (${report.bytesWritten} bytes, font from ${report.origin})`,
          },
        ],
      };
    } catch (error) {
      return {
        content: [
          {
            type: 'text',
            text: [...reporter.lines, `❌ Error: ${describeError(error)}`].join('\n'),
          },
        ],
        isError: true,
      };
    }
  });
}

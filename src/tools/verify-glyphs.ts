import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { describeError } from '../errors';
import { verifyGlyphs } from '../services/verifier';
import { createBufferedReporter } from '../utils/reporter';
import type { ToolContext } from './index';

export function registerVerifyGlyphsTool(server: McpServer, context: ToolContext = {}): void {
  server.tool('verify-glyphs', 'Check that every installed font covers the Cyrillic text used by the mods', async () => {
    const reporter = createBufferedReporter();

    try {
      const report = await verifyGlyphs({ ...context, reporter });

      return {
        content: [
          {
            type: 'text',
            text: `${reporter.lines.join('\n')}\n\n🔤 Characters checked: ${report.characters.join('')}\n📁 Fonts checked: ${report.fonts.length}`,
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

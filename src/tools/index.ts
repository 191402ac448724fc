import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { VerifyOptions } from '../services/verifier';
import { registerInstallFontsTool } from './install-fonts';
import { registerVerifyGlyphsTool } from './verify-glyphs';

/** Locations and font source the tools operate on; the defaults come from config. */
export type ToolContext = Omit<VerifyOptions, 'reporter'>;

export function registerAllTools(server: McpServer, context: ToolContext = {}): void {
  registerInstallFontsTool(server, context);
  registerVerifyGlyphsTool(server, context);
}

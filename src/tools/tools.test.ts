import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, sourceFor, stubFetch, targetsIn } from '../testing/fixtures';
import { sha256Digest } from '../utils/digest';
import { registerAllTools } from './index';

const payload = Buffer.from('upstream font payload');
const source = sourceFor(payload);

describe('MCP tools', () => {
  let root: string;
  let targets: string[];
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    root = await makeTempDir();
    targets = targetsIn(root);
    server = new McpServer({ name: 'owml-fonts-test', version: '0.0.0' });
    registerAllTools(server, { source, targets, textSources: [] });
    client = new Client({ name: 'owml-fonts-test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await fs.remove(root);
  });

  it('lists both tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual(['install-fonts', 'verify-glyphs']);
  });

  it('previews an install without writing files', async () => {
    stubFetch(payload);

    const result = await client.callTool({ name: 'install-fonts', arguments: { dryRun: true } });

    const lines = [`• Downloading ${source.url}`, ...targets.map((target) => `• Would write font to ${target}`)];
    expect(result).toMatchObject({
      content: [{ type: 'text', text: `${lines.join('\n')}\n\n📊 0/3 targets written (0 bytes, font from download)` }],
    });
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('returns failures as error results', async () => {
    const tampered = Buffer.from('tampered font payload');
    stubFetch(tampered);

    const result = await client.callTool({ name: 'verify-glyphs', arguments: {} });

    expect(result).toMatchObject({
      isError: true,
      content: [
        {
          type: 'text',
          text: `• Downloading ${source.url}\n❌ Error: Downloaded font does not match expected SHA-256. Expected ${source.sha256}, got ${sha256Digest(tampered)}.`,
        },
      ],
    });
  });
});

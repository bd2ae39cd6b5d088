import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig } from '../src/config.js';
import { createMcpServer } from '../src/server.js';

describe('mcp server', () => {
  let client: Client;

  beforeEach(async () => {
    const server = createMcpServer(defaultConfig(process.cwd()));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'report-test', version: '0.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
  });

  it('lists the report tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual(['report.preview', 'report.render', 'report.toc']);
  });

  it('extracts a table of contents', async () => {
    const result = await client.callTool({ name: 'report.toc', arguments: { content: '## Scope\n' } });
    expect(result.structuredContent).toEqual({
      entries: [{ title: 'Scope', anchor: 'scope', depth: 0 }],
      markdown: '## Scope {#scope}\n',
    });
  });

  it('previews a body without the contents block', async () => {
    const result = await client.callTool({
      name: 'report.preview',
      arguments: { content: '**bold**\n', includeToc: false },
    });
    expect(result.structuredContent).toEqual({ html: '<p><strong>bold</strong></p>', warnings: [] });
  });
});

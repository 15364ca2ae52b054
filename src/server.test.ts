import { describe, it, expect, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ZoomClient } from './providers/zoom/client.js';
import { buildServer } from './server.js';
import { FakeTransport } from './test-support/fake-transport.js';
import { createZoomTools } from './tools/zoom-tools.js';

describe('buildServer', () => {
  const closers: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const close of closers.splice(0)) {
      await close();
    }
  });

  async function connect(transport: FakeTransport): Promise<Client> {
    const zoomClient = new ZoomClient({
      credentials: { key: 'test-key', secret: 'test-secret' },
      transport,
      clock: () => 1700000000
    });
    const server = buildServer(createZoomTools(zoomClient));
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    closers.push(() => client.close(), () => server.close());
    return client;
  }

  it('registers every Zoom tool', async () => {
    const client = await connect(new FakeTransport());

    const { tools } = await client.listTools();

    expect(tools).toHaveLength(15);
    expect(tools.find((tool) => tool.name === 'zoom_get_user_token')).toMatchObject({
      title: 'zoom_get_user_token',
      description: "Get a Zoom user's ZAK token, used to start meetings on their behalf"
    });
  });

  it('runs a tool call against the Zoom client', async () => {
    const transport = new FakeTransport().on('GET', 'users/u-1/token', { json: { token: 'test-zak' } });
    const client = await connect(transport);

    const result = await client.callTool({ name: 'zoom_get_user_token', arguments: { userId: 'u-1' } });

    expect(result.structuredContent).toEqual({ token: 'test-zak' });
    expect(transport.trace()).toEqual(['GET users/u-1/token']);
  });
});

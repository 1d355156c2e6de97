import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createFakeService } from '../../services/tabelog/__tests__/fixtures/fake-service.js';
import { createMcpServer } from '../server.js';

async function connect() {
  const { service, transport } = createFakeService(() =>
    JSON.stringify([{ name: '寿司', datatype: 'Genre2', id_in_datatype: 201 }])
  );
  const server = createMcpServer(service);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'gurume-test', version: '0.0.0' });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return { client, server, transport };
}

describe('MCP server', () => {
  it('registers the four read-only tools', async () => {
    const { client, server } = await connect();
    try {
      const { tools } = await client.listTools();
      assert.deepEqual(
        tools.map((tool) => tool.name).sort(),
        ['get_area_suggestions', 'get_keyword_suggestions', 'list_cuisines', 'search_restaurants']
      );
      for (const tool of tools) {
        assert.equal(tool.annotations?.readOnlyHint, true, tool.name);
      }
    } finally {
      await client.close();
      await server.close();
    }
  });

  it('routes tool calls to the search service', async () => {
    const { client, server, transport } = await connect();
    try {
      const result = await client.callTool({ name: 'get_keyword_suggestions', arguments: { query: 'すし' } });
      assert.notEqual(result.isError, true);
      assert.deepEqual(result.content, [
        {
          type: 'text',
          text: JSON.stringify(
            [{ name: '寿司', kind: 'cuisine', datatype: 'Genre2', id: 201, lat: null, lng: null }],
            null,
            2
          ),
        },
      ]);
      assert.equal(transport.mock.callCount(), 1);
    } finally {
      await client.close();
      await server.close();
    }
  });
});

/**
 * Unit tests for the MCP server wiring
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, describe, it, expect } from 'vitest';

import { CARD_PARAMETERS_HINT, createMcpServer } from '@/modules/mcp/index.js';

import {
  makeFakePlatformClient,
  makeSequentialIds,
  makeSilentLogger,
  type FakePlatformClient,
} from '../../fixtures/fakes.js';

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const clients: Client[] = [];

afterEach(async () => {
  await Promise.all(clients.splice(0).map((client) => client.close()));
});

const connect = async (
  platform: FakePlatformClient = makeFakePlatformClient(),
  responseSizeLimit = 100_000
) => {
  const server = createMcpServer({
    platform,
    ids: makeSequentialIds(),
    config: { responseSizeLimit },
    logger: makeSilentLogger(),
  });
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  clients.push(client);
  return client;
};

/** First text block of a tool result, decoded */
const payloadOf = (result: unknown): unknown => {
  if (typeof result === 'object' && result !== null && 'content' in result) {
    const { content } = result;
    if (Array.isArray(content)) {
      const [first]: unknown[] = content;
      if (typeof first === 'object' && first !== null && 'text' in first) {
        const { text } = first;
        if (typeof text === 'string') {
          const parsed: unknown = JSON.parse(text);
          return parsed;
        }
      }
    }
  }
  throw new Error('Tool result has no text content');
};

const isErrorResult = (result: unknown): boolean =>
  typeof result === 'object' && result !== null && 'isError' in result && result.isError === true;

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe('createMcpServer', () => {
  it('registers every tool', async () => {
    const client = await connect();

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'create_card',
      'get_card_parameters_documentation',
      'get_dashboard_parameters_documentation',
      'update_card',
      'update_dashboard_parameters',
      'validate_card_parameters',
      'validate_dashboard_parameters',
    ]);
  });

  it('returns tool output as JSON text', async () => {
    const client = await connect();

    const result = await client.callTool({
      name: 'validate_card_parameters',
      arguments: { parameters: [{ name: 'status', type: 'category', default: 'active' }] },
    });

    expect(isErrorResult(result)).toBe(false);
    expect(payloadOf(result)).toEqual({
      valid: true,
      parameters_count: 1,
      errors: [],
      warnings: [],
    });
  });

  it('returns parameter errors with the full list and a hint', async () => {
    const platform = makeFakePlatformClient();
    const client = await connect(platform);

    const result = await client.callTool({
      name: 'create_card',
      arguments: {
        name: 'Orders',
        database_id: 1,
        query: 'SELECT * FROM orders WHERE status = {{status}}',
        parameters: [{ name: 'status', type: 'category', default: 1 }],
      },
    });

    expect(isErrorResult(result)).toBe(true);
    expect(payloadOf(result)).toEqual({
      ok: false,
      code: 'INVALID_PARAMETERS',
      error: 'Parameter configuration is invalid (1 error(s))',
      valid: false,
      errors: ["Parameter 0 (status): default for 'category' must be a string, got number 1"],
      hint: CARD_PARAMETERS_HINT,
    });
    expect(platform.requests).toEqual([]);
  });

  it('returns platform errors', async () => {
    const client = await connect();

    const result = await client.callTool({
      name: 'update_card',
      arguments: { card_id: 7, name: 'Renamed' },
    });

    expect(isErrorResult(result)).toBe(true);
    expect(payloadOf(result)).toEqual({
      ok: false,
      code: 'NOT_FOUND',
      error: 'No route for GET card/7',
    });
  });

  it('refuses responses above the size limit', async () => {
    const client = await connect(makeFakePlatformClient(), 50);

    const result = await client.callTool({
      name: 'get_card_parameters_documentation',
      arguments: {},
    });

    expect(isErrorResult(result)).toBe(true);
    expect(payloadOf(result)).toMatchObject({ ok: false, code: 'RESPONSE_TOO_LARGE' });
  });
});

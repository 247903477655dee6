/**
 * MCP server round trips over an in-memory transport
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createServer } from '../src/server.js';
import { createContainer } from '../src/container.js';
import { loadConfig } from '../src/config.js';
import { FAMILY_LOGIC } from './fixtures.js';

function parseToolResult(result: unknown): { payload: unknown; isError: boolean } {
    const parsed = CallToolResultSchema.parse(result);
    const [first] = parsed.content;
    if (first?.type !== 'text') {
        throw new Error('expected a text content block');
    }
    return { payload: JSON.parse(first.text), isError: parsed.isError === true };
}

describe('MCP server', () => {
    let server: Server;
    let client: Client;

    beforeEach(async () => {
        server = createServer(createContainer(loadConfig({})));
        client = new Client({ name: 'test-client', version: '0.0.0' });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    });

    afterEach(async () => {
        await client.close();
        await server.close();
    });

    test('lists the tools', async () => {
        const { tools } = await client.listTools();
        expect(tools.map(t => t.name)).toEqual(['parse-logic', 'check-logic', 'reason', 'ingest-knowledge-base']);
    });

    test('reason returns derived facts', async () => {
        const result = await client.callTool({
            name: 'reason',
            arguments: { logic: FAMILY_LOGIC, verbosity: 'minimal' },
        });

        expect(parseToolResult(result)).toEqual({
            payload: { status: 'ok', derived: ['grandparent(john, susan)'] },
            isError: false,
        });
    });

    test('invalid arguments come back as a structured error', async () => {
        const result = await client.callTool({ name: 'parse-logic', arguments: {} });

        expect(parseToolResult(result)).toEqual({
            payload: { code: 'INVALID_ARGUMENT', message: 'Invalid arguments: logic: Required' },
            isError: true,
        });
    });

    test('unknown tools are rejected', async () => {
        const result = await client.callTool({ name: 'prove', arguments: {} });

        expect(parseToolResult(result)).toEqual({
            payload: { code: 'INVALID_ARGUMENT', message: 'Unknown tool: prove' },
            isError: true,
        });
    });

    test('ingestion without an LLM endpoint reports a configuration error', async () => {
        const result = await client.callTool({ name: 'ingest-knowledge-base', arguments: { text: 'Ann likes tea.' } });
        const { payload, isError } = parseToolResult(result);

        expect(isError).toBe(true);
        expect(payload).toMatchObject({
            code: 'CONFIG_ERROR',
            message: 'Invalid configuration: no LLM endpoint configured',
        });
    });

    test('lists and renders prompts', async () => {
        const { prompts } = await client.listPrompts();
        expect(prompts.map(p => p.name)).toEqual(['formalize-knowledge-base', 'repair-logic']);

        const prompt = await client.getPrompt({ name: 'formalize-knowledge-base', arguments: { text: 'Ann likes tea.' } });
        expect(prompt.messages).toHaveLength(1);
    });
});

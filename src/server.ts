/**
 * kbreason MCP Server
 *
 * MCP server providing tools for forward-chaining reasoning over logic text:
 * parse-logic, check-logic, reason and ingest-knowledge-base.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
    ListPromptsRequestSchema,
    GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { listPrompts, getPrompt } from './prompts/index.js';

import {
    ReasonerException,
    createInvalidArgumentError,
    errorMessage,
    serializeReasonerError,
} from './types/index.js';
import * as Handlers from './handlers/index.js';
import { TOOLS } from './tools/definitions.js';
import { createContainer, ServerContainer } from './container.js';

export const SERVER_NAME = 'kbreason';
export const SERVER_VERSION = '0.1.0';

type ProgressCallback = (progress: number | undefined, message: string) => void;

type ToolHandler = (
    args: Record<string, unknown>,
    container: ServerContainer,
    options: { onProgress?: ProgressCallback }
) => unknown;

const toolHandlers: Record<string, ToolHandler> = {
    'parse-logic': (args) =>
        Handlers.parseLogicHandler(args),

    'check-logic': (args) =>
        Handlers.checkLogicHandler(args),

    'reason': (args, c, opts) =>
        Handlers.reasonHandler(args, c.config.evaluation, opts.onProgress),

    'ingest-knowledge-base': (args, c, opts) =>
        Handlers.ingestKnowledgeBaseHandler(args, c.translator, c.config.evaluation, opts.onProgress),
};

function textContent(value: unknown) {
    return [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }];
}

/**
 * Create and configure the MCP server
 */
export function createServer(container: ServerContainer = createContainer()): Server {
    const server = new Server(
        {
            name: SERVER_NAME,
            version: SERVER_VERSION,
        },
        {
            capabilities: {
                tools: {},
                prompts: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    // ==================== MCP PROMPTS HANDLERS ====================

    server.setRequestHandler(ListPromptsRequestSchema, async () => {
        return {
            prompts: listPrompts().map(p => ({
                name: p.name,
                description: p.description,
                arguments: p.arguments,
            })),
        };
    });

    server.setRequestHandler(GetPromptRequestSchema, async (request) => {
        const { name, arguments: promptArgs } = request.params;
        const result = getPrompt(name, promptArgs ?? {});

        if (result === null) {
            throw createInvalidArgumentError(`Prompt not found: ${name}`);
        }

        return {
            description: result.description,
            messages: result.messages,
        };
    });

    // ==================== TOOL CALLS ====================

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: rawArgs } = request.params;
        const args = rawArgs ?? {};

        try {
            const handler = toolHandlers[name];
            if (!handler) {
                throw createInvalidArgumentError(`Unknown tool: ${name}`);
            }

            const progressToken = request.params._meta?.progressToken;
            const onProgress: ProgressCallback | undefined = progressToken !== undefined
                ? (progress, message) => {
                    server.notification({
                        method: 'notifications/progress',
                        params: {
                            progressToken,
                            progress: progress ?? 0,
                            total: 1.0,
                            message,
                        },
                    }).catch(error => console.error(`Progress notification failed: ${errorMessage(error)}`));
                }
                : undefined;

            const result = await handler(args, container, { onProgress });

            return { content: textContent(result) };
        } catch (error) {
            if (error instanceof ReasonerException) {
                return { content: textContent(serializeReasonerError(error.error)), isError: true };
            }

            console.error(`Tool '${name}' failed:`, error);
            return {
                content: textContent({
                    error: errorMessage(error),
                    type: error instanceof Error ? error.constructor.name : 'Error',
                }),
                isError: true,
            };
        }
    });

    return server;
}

/**
 * Run the MCP server on stdio
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    console.error(`${SERVER_NAME} MCP server v${SERVER_VERSION} running on stdio`);
}

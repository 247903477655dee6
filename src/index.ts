#!/usr/bin/env node
/**
 * kbreason - MCP server entry point
 */

import 'dotenv/config';
import { runServer, SERVER_NAME, SERVER_VERSION } from './server.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.includes('--help') || args.includes('-h')) {
        console.log(`
${SERVER_NAME} MCP Server - forward-chaining reasoning over fact/rule text

Usage: kbreason-mcp [options]

Options:
  --help, -h     Show this help message
  --version, -v  Show version information

Tools:
  - parse-logic            Parse logic text into facts and rules
  - check-logic            Line-level syntax check
  - reason                 Derive new facts by forward chaining
  - ingest-knowledge-base  Natural language -> logic (LLM) -> derived facts

Prompts:
  - formalize-knowledge-base, repair-logic

Environment:
  OPENAI_API_KEY, OPENAI_BASE_URL, MODEL_NAME, LLM_TEMPERATURE, LLM_MAX_RETRIES,
  KB_EVALUATION_MODE (single-pass|fixpoint), KB_JOIN_STRATEGY (indexed|naive)

The server communicates via stdio using the Model Context Protocol.
`);
        return;
    }

    if (args.includes('--version') || args.includes('-v')) {
        console.log(`${SERVER_NAME} version ${SERVER_VERSION}`);
        return;
    }

    try {
        await runServer();
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

main().catch(error => {
    console.error(error);
    process.exit(1);
});

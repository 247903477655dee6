/**
 * LLM instructions for translating and repairing logic text, and the MCP
 * prompts built from them.
 */

export {
    PROMPTS,
    TRANSLATION_INSTRUCTION,
    buildRefinementInstruction,
    listPrompts,
    getPrompt
} from './templates.js';

export type {
    Prompt,
    PromptArgument,
    PromptMessage,
    GetPromptResult,
} from './templates.js';

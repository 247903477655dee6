/**
 * Utilities for turning raw LLM output into logic text.
 */

import { stripCodeFences } from '../parser/index.js';

/**
 * Extract the logic text from a model reply.
 *
 * If the reply holds a fenced code block, only the first block is kept;
 * otherwise the whole reply is used. Stray fence markers are removed.
 */
export function extractLogicText(rawOutput: string): string {
    const codeBlockMatch = rawOutput.match(/```(?:prolog|logic|text)?\s*([\s\S]*?)```/);
    const content = codeBlockMatch ? codeBlockMatch[1] : rawOutput;
    return stripCodeFences(content).trim();
}

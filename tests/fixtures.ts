/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { parse } from '../src/parser/index.js';
import type { Fact, LLMMessage, LLMProvider, LLMResponse, Rule } from '../src/types/index.js';
import type { DerivedFactSet } from '../src/engines/forward/index.js';
import { formatDerivedFact } from '../src/utils/formatting.js';

// === Logic texts ===

export const FAMILY_LOGIC = [
    '% family',
    'parent(john, mary).',
    'this is not logic',
    'parent(mary, susan).',
    'grandparent(X, Y) :-',
    '    parent(X, Z),',
    '    parent(Z, Y).',
].join('\n');

export const CHAIN_LOGIC = [
    'parent(a, b).',
    'parent(b, c).',
    'parent(c, d).',
    'ancestor(X, Y) :- parent(X, Y).',
    'ancestor(X, Y) :- parent(X, Z), ancestor(Z, Y).',
].join('\n');

// === Helpers ===

/**
 * Parse logic text and return only the facts and rules
 */
export function program(text: string): { facts: Fact[]; rules: Rule[] } {
    const { facts, rules } = parse(text);
    return { facts, rules };
}

/**
 * Derived facts as sorted strings, for order-independent comparison
 */
export function derivedLines(derived: DerivedFactSet): string[] {
    return derived.toArray().map(formatDerivedFact).sort();
}

// === LLM stand-in ===

/**
 * Provider returning scripted replies in order and recording every call
 */
export class ScriptedProvider implements LLMProvider {
    readonly calls: LLMMessage[][] = [];
    private readonly replies: string[];

    constructor(replies: string[]) {
        this.replies = [...replies];
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        this.calls.push(messages);
        const content = this.replies.shift();
        if (content === undefined) {
            throw new Error('No scripted reply left');
        }
        return { content, usage: { promptTokens: 0, completionTokens: 0 } };
    }
}

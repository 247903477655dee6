/**
 * Prompt Templates
 *
 * Instructions sent to the text-generation service, also published as MCP
 * prompts so a client model can produce logic text itself.
 */

/**
 * Prompt argument definition
 */
export interface PromptArgument {
    name: string;
    description: string;
    required: boolean;
}

/**
 * Prompt definition
 */
export interface Prompt {
    name: string;
    description: string;
    arguments: PromptArgument[];
}

/**
 * Prompt message (for GetPrompt response)
 */
export interface PromptMessage {
    role: 'user' | 'assistant';
    content: {
        type: 'text';
        text: string;
    };
}

/**
 * GetPrompt response
 */
export interface GetPromptResult {
    description: string;
    messages: PromptMessage[];
}

export const TRANSLATION_INSTRUCTION =
    'Translate the following facts written in natural language into Prolog-style logic. ' +
    'Also define rules if needed. ' +
    'Write one statement per line: facts as name(arg1, arg2). and rules as head(X, Y) :- body1(X, Z), body2(Z, Y). ' +
    'Use lowercase constants and uppercase variables. ' +
    'Ensure that each predicate and rule is properly closed with parentheses and a period at the end. ' +
    'Do not use Markdown formatting or code blocks.';

/**
 * System instruction for repairing logic text that failed validation
 */
export function buildRefinementInstruction(errors: readonly string[]): string {
    return `The following logic has errors:\n${errors.join('\n')}\n` +
        'Please fix the logic without using Markdown code blocks. Reply with the corrected logic only.';
}

/**
 * All available prompts
 */
export const PROMPTS: Prompt[] = [
    {
        name: 'formalize-knowledge-base',
        description: 'Translate a natural-language knowledge base into fact and rule statements',
        arguments: [
            {
                name: 'text',
                description: 'The knowledge base in natural language',
                required: true,
            },
        ],
    },
    {
        name: 'repair-logic',
        description: 'Ask for a corrected version of logic text that failed validation',
        arguments: [
            {
                name: 'logic',
                description: 'The logic text to repair',
                required: true,
            },
            {
                name: 'errors',
                description: 'Validator messages, one per line',
                required: true,
            },
        ],
    },
];

export function listPrompts(): Prompt[] {
    return PROMPTS;
}

/**
 * Render a prompt with its arguments; null for unknown prompts
 */
export function getPrompt(name: string, args: Record<string, string>): GetPromptResult | null {
    switch (name) {
        case 'formalize-knowledge-base':
            return {
                description: 'Translate a knowledge base into logic text',
                messages: [
                    {
                        role: 'user',
                        content: { type: 'text', text: `${TRANSLATION_INSTRUCTION}\n\n${args.text ?? ''}` },
                    },
                ],
            };
        case 'repair-logic': {
            const errors = (args.errors ?? '').split('\n').filter(e => e.trim());
            return {
                description: 'Repair malformed logic text',
                messages: [
                    {
                        role: 'user',
                        content: { type: 'text', text: `${buildRefinementInstruction(errors)}\n\n${args.logic ?? ''}` },
                    },
                ],
            };
        }
        default:
            return null;
    }
}

import type { LLMProvider, TranslationStrategy } from '../types/llm.js';
import { TRANSLATION_INSTRUCTION, buildRefinementInstruction } from '../prompts/index.js';
import { extractLogicText } from './outputParser.js';

/**
 * Translates natural language into logic text, and repairs logic text that
 * failed validation, through an LLM provider.
 */
export class LogicTranslator implements TranslationStrategy {
    private provider: LLMProvider;

    constructor(provider: LLMProvider) {
        this.provider = provider;
    }

    async translate(text: string): Promise<string> {
        const response = await this.provider.complete([
            { role: 'system', content: TRANSLATION_INSTRUCTION },
            { role: 'user', content: text },
        ]);
        return extractLogicText(response.content);
    }

    async refine(logic: string, errors: string[]): Promise<string> {
        const response = await this.provider.complete([
            { role: 'system', content: buildRefinementInstruction(errors) },
            { role: 'user', content: logic },
        ]);
        return extractLogicText(response.content);
    }
}

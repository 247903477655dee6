/**
 * LLM Provider and Translation interfaces.
 */

export interface LLMMessage {
    role: 'system' | 'user' | 'assistant';
    content: string;
}

export interface LLMResponse {
    content: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
    };
}

export interface LLMProvider {
    complete(messages: LLMMessage[]): Promise<LLMResponse>;
}

/**
 * Explicit connection settings for the text-generation service.
 */
export interface LLMConfig {
    apiKey?: string;
    baseURL?: string;
    model: string;
    temperature: number;
    maxRetries: number;
}

/**
 * Turns natural language into logic text and repairs malformed logic text.
 */
export interface TranslationStrategy {
    translate(text: string): Promise<string>;
    refine(logic: string, errors: string[]): Promise<string>;
}

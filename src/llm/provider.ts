import { createOpenAI } from '@ai-sdk/openai';
import { generateText } from 'ai';
import type { CoreMessage, LanguageModel } from 'ai';
import type { LLMConfig, LLMMessage, LLMProvider, LLMResponse } from '../types/llm.js';
import { createLLMError, errorMessage } from '../types/errors.js';

function toCoreMessage(message: LLMMessage): CoreMessage {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content };
        case 'assistant':
            return { role: 'assistant', content: message.content };
        default:
            return { role: 'user', content: message.content };
    }
}

/**
 * LLM provider backed by the AI SDK's OpenAI client.
 *
 * Connection settings come from the LLMConfig passed in; an OpenAI-compatible
 * endpoint (local llama.cpp, vLLM, Ollama's /v1) is used when `baseURL` is set.
 * A ready-made `model` may be injected instead.
 */
export class AiSdkProvider implements LLMProvider {
    private readonly config: LLMConfig;
    private readonly model: LanguageModel;

    constructor(config: LLMConfig, model?: LanguageModel) {
        this.config = config;
        // Never undefined: the client would fall back to process.env.OPENAI_API_KEY
        this.model = model ?? createOpenAI({
            apiKey: config.apiKey ?? '',
            baseURL: config.baseURL,
        })(config.model);
    }

    async complete(messages: LLMMessage[]): Promise<LLMResponse> {
        try {
            const result = await generateText({
                model: this.model,
                messages: messages.map(toCoreMessage),
                temperature: this.config.temperature,
                maxRetries: this.config.maxRetries,
            });

            return {
                content: result.text,
                usage: {
                    promptTokens: result.usage.promptTokens,
                    completionTokens: result.usage.completionTokens,
                },
            };
        } catch (error) {
            const message = errorMessage(error);
            console.error(`LLM Provider Error: ${message}`, { model: this.config.model, baseURL: this.config.baseURL });
            throw createLLMError(message, { model: this.config.model });
        }
    }
}

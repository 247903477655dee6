import { loadConfig, hasLLMAccess } from './config.js';
import type { ReasonerConfig } from './config.js';
import { AiSdkProvider } from './llm/provider.js';
import { LogicTranslator } from './llm/translator.js';
import type { LLMProvider } from './types/index.js';

export interface ServerContainer {
    config: ReasonerConfig;
    /** null when no LLM endpoint is configured */
    llmProvider: LLMProvider | null;
    translator: LogicTranslator | null;
}

export function createContainer(config: ReasonerConfig = loadConfig()): ServerContainer {
    const llmProvider = hasLLMAccess(config) ? new AiSdkProvider(config.llm) : null;

    return {
        config,
        llmProvider,
        translator: llmProvider ? new LogicTranslator(llmProvider) : null,
    };
}

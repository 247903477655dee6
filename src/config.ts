/**
 * Configuration loaded from environment variables.
 *
 * Credentials end up in an explicit ReasonerConfig that is handed to the
 * LLM provider; nothing reads process.env after this point.
 */

import { z } from 'zod';
import { DEFAULTS, EVALUATION_MODES, JOIN_STRATEGIES, createConfigError } from './types/index.js';
import type { EvaluateOptions, LLMConfig } from './types/index.js';

const EnvSchema = z.object({
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    MODEL_NAME: z.string().min(1).default(DEFAULTS.model),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(DEFAULTS.temperature),
    LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULTS.maxRetries),
    KB_EVALUATION_MODE: z.enum(['single-pass', 'fixpoint']).default(DEFAULTS.mode),
    KB_JOIN_STRATEGY: z.enum(['indexed', 'naive']).default(DEFAULTS.join),
});

export interface ReasonerConfig {
    llm: LLMConfig;
    evaluation: Required<EvaluateOptions>;
}

/**
 * Validate `env` and build the configuration. Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ReasonerConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw createConfigError(issues.join('; '), {
            issues,
            evaluationModes: EVALUATION_MODES,
            joinStrategies: JOIN_STRATEGIES,
        });
    }

    const values = parsed.data;
    return {
        llm: {
            apiKey: values.OPENAI_API_KEY,
            baseURL: values.OPENAI_BASE_URL,
            model: values.MODEL_NAME,
            temperature: values.LLM_TEMPERATURE,
            maxRetries: values.LLM_MAX_RETRIES,
        },
        evaluation: {
            mode: values.KB_EVALUATION_MODE,
            join: values.KB_JOIN_STRATEGY,
        },
    };
}

/**
 * Whether the configuration can reach a text-generation service
 */
export function hasLLMAccess(config: ReasonerConfig): boolean {
    return Boolean(config.llm.apiKey || config.llm.baseURL);
}

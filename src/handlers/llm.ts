import { z } from 'zod';
import type { EvaluateOptions, IngestResponse, TranslationStrategy } from '../types/index.js';
import { createConfigError } from '../types/index.js';
import { ingestKnowledgeBase } from '../pipeline.js';
import { buildReasonResponse, joinSchema, modeSchema, parseArgs, verbositySchema } from './utils.js';

const ingestArgs = z.object({
    text: z.string().min(1),
    mode: modeSchema,
    join: joinSchema,
    verbosity: verbositySchema,
});

export async function ingestKnowledgeBaseHandler(
    args: unknown,
    translator: TranslationStrategy | null,
    defaults: Required<EvaluateOptions>,
    onProgress?: (progress: number | undefined, message: string) => void
): Promise<IngestResponse> {
    const { text, mode, join, verbosity } = parseArgs(ingestArgs, args);

    if (!translator) {
        throw createConfigError('no LLM endpoint configured', {
            required: ['OPENAI_API_KEY', 'OPENAI_BASE_URL'],
        });
    }

    const result = await ingestKnowledgeBase(text, translator, {
        mode: mode ?? defaults.mode,
        join: join ?? defaults.join,
        onProgress,
    });

    return {
        logic: result.logic,
        refined: result.refined,
        validationErrors: result.validation.errors,
        result: buildReasonResponse(result, verbosity),
    };
}

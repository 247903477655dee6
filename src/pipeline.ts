/**
 * Knowledge-base ingestion pipeline.
 *
 * natural language → logic text (LLM) → line validation → at most one
 * refinement call → parse → forward evaluation.
 */

import type { ReasonOptions, TranslationStrategy } from './types/index.js';
import { validateLogicText } from './syntaxValidator.js';
import type { ValidationResult } from './syntaxValidator.js';
import { reason } from './reasoner.js';
import type { ReasoningResult } from './reasoner.js';

export interface IngestionResult extends ReasoningResult {
    /** Logic text as first generated */
    generatedLogic: string;
    /** Logic text that was parsed (the refined text when refinement ran) */
    logic: string;
    refined: boolean;
    /** Validation of the generated text */
    validation: ValidationResult;
    /** Validation of the refined text, when refinement ran */
    refinedValidation?: ValidationResult;
}

export async function ingestKnowledgeBase(
    text: string,
    translator: TranslationStrategy,
    options: ReasonOptions = {}
): Promise<IngestionResult> {
    const { onProgress } = options;

    onProgress?.(0, 'Translating knowledge base to logic');
    const generatedLogic = await translator.translate(text);
    const validation = validateLogicText(generatedLogic);

    let logic = generatedLogic;
    let refinedValidation: ValidationResult | undefined;

    if (!validation.valid) {
        onProgress?.(0.4, `Refining logic (${validation.errors.length} errors)`);
        logic = await translator.refine(generatedLogic, validation.errors);
        refinedValidation = validateLogicText(logic);
    }

    onProgress?.(0.7, 'Reasoning over logic');
    const result = reason(logic, { mode: options.mode, join: options.join });
    onProgress?.(1, `Derived ${result.derived.size} facts`);

    return {
        ...result,
        generatedLogic,
        logic,
        refined: !validation.valid,
        validation,
        refinedValidation,
    };
}

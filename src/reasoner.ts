/**
 * Parse-then-evaluate entry point for logic text.
 */

import type { Diagnostic, Fact, ReasonOptions, Rule } from './types/index.js';
import { parse } from './parser/index.js';
import { evaluate, DerivedFactSet } from './engines/forward/index.js';

export interface ReasoningResult {
    /** 'empty' when the text yielded no facts and no rules: nothing to reason over */
    status: 'ok' | 'empty';
    facts: Fact[];
    rules: Rule[];
    diagnostics: Diagnostic[];
    derived: DerivedFactSet;
}

/**
 * Parse `text` and derive new facts from it. Never throws for malformed statements.
 */
export function reason(text: string, options: ReasonOptions = {}): ReasoningResult {
    const { onProgress, ...evaluateOptions } = options;

    onProgress?.(undefined, 'Parsing logic text');
    const { facts, rules, diagnostics } = parse(text);

    if (facts.length === 0 && rules.length === 0) {
        onProgress?.(1, 'Nothing to reason over');
        return { status: 'empty', facts, rules, diagnostics, derived: new DerivedFactSet() };
    }

    onProgress?.(0.5, `Evaluating ${rules.length} rules over ${facts.length} facts`);
    const derived = evaluate(facts, rules, evaluateOptions);

    onProgress?.(1, `Derived ${derived.size} facts`);
    return { status: 'ok', facts, rules, diagnostics, derived };
}

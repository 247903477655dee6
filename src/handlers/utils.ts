import { z } from 'zod';
import { createInvalidArgumentError } from '../types/index.js';
import type {
    Diagnostic,
    ReasonResponse,
    MinimalReasonResponse,
    StandardReasonResponse,
    DetailedReasonResponse,
    Verbosity,
} from '../types/index.js';
import type { ReasoningResult } from '../reasoner.js';
import { formatDerivedFact, formatDiagnostic, formatFact, formatRule } from '../utils/formatting.js';

export const verbositySchema = z.enum(['minimal', 'standard', 'detailed']).default('standard');
export const modeSchema = z.enum(['single-pass', 'fixpoint']).optional();
export const joinSchema = z.enum(['indexed', 'naive']).optional();

/**
 * Validate tool arguments, raising INVALID_ARGUMENT with every issue listed
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
    const parsed = schema.safeParse(args);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
        throw createInvalidArgumentError(`Invalid arguments: ${issues.join('; ')}`);
    }
    return parsed.data;
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
    return diagnostics.map(formatDiagnostic);
}

/**
 * Build reasoning response based on verbosity level
 */
export function buildReasonResponse(result: ReasoningResult, verbosity: Verbosity = 'standard'): ReasonResponse {
    const minimal: MinimalReasonResponse = {
        status: result.status,
        derived: result.derived.toArray().map(formatDerivedFact),
    };
    if (verbosity === 'minimal') {
        return minimal;
    }

    const standard: StandardReasonResponse = {
        ...minimal,
        counts: {
            facts: result.facts.length,
            rules: result.rules.length,
            derived: result.derived.size,
        },
        diagnostics: formatDiagnostics(result.diagnostics),
    };
    if (verbosity === 'standard') {
        return standard;
    }

    const detailed: DetailedReasonResponse = {
        ...standard,
        facts: result.facts.map(formatFact),
        rules: result.rules.map(formatRule),
    };
    return detailed;
}

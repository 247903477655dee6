import { z } from 'zod';
import type { EvaluateOptions, ParseResponse, ReasonResponse } from '../types/index.js';
import { parse } from '../parser/index.js';
import { reason } from '../reasoner.js';
import { validateLogicText } from '../syntaxValidator.js';
import type { ValidationResult } from '../syntaxValidator.js';
import { formatFact, formatRule } from '../utils/formatting.js';
import {
    buildReasonResponse,
    formatDiagnostics,
    joinSchema,
    modeSchema,
    parseArgs,
    verbositySchema,
} from './utils.js';

const logicArgs = z.object({
    logic: z.string(),
});

const reasonArgs = z.object({
    logic: z.string(),
    mode: modeSchema,
    join: joinSchema,
    verbosity: verbositySchema,
});

export function parseLogicHandler(args: unknown): ParseResponse {
    const { logic } = parseArgs(logicArgs, args);
    const result = parse(logic);
    return {
        facts: result.facts.map(formatFact),
        rules: result.rules.map(formatRule),
        diagnostics: formatDiagnostics(result.diagnostics),
    };
}

export function checkLogicHandler(args: unknown): ValidationResult {
    const { logic } = parseArgs(logicArgs, args);
    return validateLogicText(logic);
}

export function reasonHandler(
    args: unknown,
    defaults: Required<EvaluateOptions>,
    onProgress?: (progress: number | undefined, message: string) => void
): ReasonResponse {
    const { logic, mode, join, verbosity } = parseArgs(reasonArgs, args);
    const result = reason(logic, {
        mode: mode ?? defaults.mode,
        join: join ?? defaults.join,
        onProgress,
    });
    return buildReasonResponse(result, verbosity);
}

/**
 * Incremental knowledge base used by the interactive shell.
 *
 * Statements are kept as text; every query re-parses the whole base so the
 * multi-line rule handling is the same as for a file.
 */

import type { EvaluateOptions } from './types/index.js';
import { reason } from './reasoner.js';
import type { ReasoningResult } from './reasoner.js';

export class KnowledgeBaseSession {
    private lines: string[] = [];
    private readonly options: EvaluateOptions;

    constructor(options: EvaluateOptions = {}) {
        this.options = options;
    }

    /** Append logic text (one or more lines). */
    tell(text: string): void {
        this.lines.push(...text.split('\n'));
    }

    get text(): string {
        return this.lines.join('\n');
    }

    derive(): ReasoningResult {
        return reason(this.text, this.options);
    }

    clear(): void {
        this.lines = [];
    }
}

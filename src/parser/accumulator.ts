import { RULE_OPERATOR, TERMINATOR } from '../types/index.js';

export type StatementKind = 'fact' | 'rule';

export interface Statement {
    kind: StatementKind;
    text: string;
    /** 1-based line on which the statement started */
    line: number;
}

export type AccumulatorState =
    | { kind: 'idle' }
    | { kind: 'collecting'; text: string; startLine: number };

const COMMENT_MARKERS = ['%', '//', '#'];

export function isCommentLine(line: string): boolean {
    return COMMENT_MARKERS.some(marker => line.startsWith(marker));
}

/**
 * Remove code-fence markers (```, ```prolog, ...) wherever they appear.
 */
export function stripCodeFences(text: string): string {
    return text.replace(/```[A-Za-z]*/g, '');
}

/**
 * Joins physical lines into complete statements.
 *
 * A line holding `:-` opens a rule that keeps collecting lines until the
 * accumulated text ends with the terminator; every other line is a fact.
 */
export class StatementAccumulator {
    private state: AccumulatorState = { kind: 'idle' };

    get current(): AccumulatorState {
        return this.state;
    }

    /**
     * Feed one physical line. Returns the statement it completes, if any.
     */
    feed(rawLine: string, lineNumber: number): Statement | null {
        const line = rawLine.trim();
        if (!line || isCommentLine(line)) return null;

        const state = this.state;
        if (state.kind === 'idle' && !line.includes(RULE_OPERATOR)) {
            return { kind: 'fact', text: line, line: lineNumber };
        }

        const text = state.kind === 'idle' ? line : `${state.text} ${line}`;
        const startLine = state.kind === 'idle' ? lineNumber : state.startLine;

        if (text.endsWith(TERMINATOR)) {
            this.state = { kind: 'idle' };
            return { kind: 'rule', text, line: startLine };
        }
        this.state = { kind: 'collecting', text, startLine };
        return null;
    }

    /**
     * End of input. Returns the unterminated rule text still being collected, if any.
     */
    flush(): { text: string; line: number } | null {
        if (this.state.kind === 'idle') return null;
        const pending = { text: this.state.text, line: this.state.startLine };
        this.state = { kind: 'idle' };
        return pending;
    }
}

/**
 * Split logic text into statements, reporting an unterminated trailing rule.
 */
export function splitStatements(text: string): {
    statements: Statement[];
    unterminated: { text: string; line: number } | null;
} {
    const accumulator = new StatementAccumulator();
    const statements: Statement[] = [];

    stripCodeFences(text).split('\n').forEach((line, index) => {
        const statement = accumulator.feed(line, index + 1);
        if (statement) statements.push(statement);
    });

    return { statements, unterminated: accumulator.flush() };
}

import type { Diagnostic, Fact, ParseResult, Rule } from '../types/index.js';
import { splitStatements } from './accumulator.js';
import { parsePredicate } from './predicate.js';
import { structureRule } from './rule.js';

export { splitTopLevel, findMatchingParen } from './splitter.js';
export { parsePredicate, parseAtom, classifyTerm, ANONYMOUS_VARIABLE } from './predicate.js';
export type { PredicateParse } from './predicate.js';
export { structureRule, unwrapEnclosingParens } from './rule.js';
export type { RuleStructure } from './rule.js';
export {
    StatementAccumulator,
    splitStatements,
    stripCodeFences,
    isCommentLine,
} from './accumulator.js';
export type { Statement, StatementKind, AccumulatorState } from './accumulator.js';

/**
 * Parse logic text into facts and rules.
 *
 * Never throws: every statement that cannot be used is reported in
 * `diagnostics` and parsing carries on with the next one.
 */
export function parse(text: string): ParseResult {
    const facts: Fact[] = [];
    const rules: Rule[] = [];
    const diagnostics: Diagnostic[] = [];

    const { statements, unterminated } = splitStatements(text);

    for (const statement of statements) {
        if (statement.kind === 'rule') {
            const structured = structureRule(statement.text, statement.line);
            diagnostics.push(...structured.diagnostics);
            if (structured.ok) rules.push(structured.rule);
            continue;
        }

        const parsed = parsePredicate(statement.text);
        if (parsed.ok) {
            facts.push({ predicate: parsed.predicate, values: parsed.args, line: statement.line });
        } else {
            diagnostics.push({
                kind: 'MalformedLine',
                line: statement.line,
                text: statement.text,
                message: `Skipping invalid line: ${parsed.reason}`,
            });
        }
    }

    if (unterminated) {
        diagnostics.push({
            kind: 'UnterminatedRule',
            line: unterminated.line,
            text: unterminated.text,
            message: `Rule is missing its terminating '.'`,
        });
    }

    return { facts, rules, diagnostics };
}
